import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { utils } from 'ssh2';
import { RemoteExecutionConfig, RemoteTarget } from '../interfaces';
import { ConnectionError } from './errors';
import { expandHome } from './sanitization';

const DEFAULT_IDENTITIES = ['id_ed25519', 'id_ecdsa', 'id_rsa'];

/**
 * Whether the key at the path parses with the passphrase given (if any).
 * Encrypted keys without a passphrase do not.
 */
export function canLoadIdentity(keyPath: string, passphrase?: string): boolean {
  let data: Buffer;
  try {
    data = fs.readFileSync(keyPath);
  } catch (error) {
    return false;
  }
  return !(utils.parseKey(data, passphrase) instanceof Error);
}

/**
 * First default private key that exists and can be loaded. Keys that
 * cannot be loaded are skipped, leaving the agent to authenticate.
 */
export function findDefaultIdentity(
  homeDir: string = os.homedir(),
  passphrase?: string
): string | undefined {
  return DEFAULT_IDENTITIES.map((name) => path.join(homeDir, '.ssh', name)).find(
    (candidate) =>
      fs.existsSync(candidate) && canLoadIdentity(candidate, passphrase)
  );
}

/**
 * Builds the connection settings for a target, discovering credentials the
 * way an ssh client does: agent, explicit identity, default identities.
 */
export function resolveConnectionConfig(
  target: RemoteTarget,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): RemoteExecutionConfig {
  let privateKeyPath = target.identityFile ?? env.SSH_PRIVATE_KEY;
  if (privateKeyPath) {
    privateKeyPath = expandHome(privateKeyPath);
    if (!fs.existsSync(privateKeyPath)) {
      throw new ConnectionError(`Private key file not found: ${privateKeyPath}`);
    }
  } else {
    privateKeyPath = findDefaultIdentity(
      homeDir,
      env.SSH_PASSPHRASE || undefined
    );
  }

  return {
    ssh: {
      host: target.host,
      port: target.port,
      username: target.user,
      agent: env.SSH_AUTH_SOCK || undefined,
      password: env.SSH_PASSWORD || undefined,
      privateKeyPath,
      passphrase: env.SSH_PASSPHRASE || undefined,
      readyTimeout: 20000,
    },
    hostKeys: {
      knownHostsFile: target.knownHostsFile,
      strict: target.strictHostKeyChecking,
    },
  };
}
