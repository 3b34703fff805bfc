import { RemoteSession, SessionConnector } from '../interfaces';
import { describeError } from './errors';

/**
 * Opens a session, hands it to `use`, and closes it on every way out.
 * A failure while closing is only warned about; it never replaces the
 * outcome of `use`.
 */
export async function withSession<T>(
  connect: SessionConnector,
  use: (session: RemoteSession) => Promise<T>
): Promise<T> {
  const session = await connect();

  try {
    return await use(session);
  } finally {
    try {
      await session.dispose();
    } catch (error) {
      console.warn(
        `Warning: failed to close remote session: ${describeError(error)}`
      );
    }
  }
}
