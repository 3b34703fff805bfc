import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import shellEscape from 'shell-escape';
import { RemoteSession, TransferSummary } from '../interfaces';
import {
  PipelineError,
  TransferError,
  describeError,
  errorCode,
} from '../lib/errors';

export type TransferDirection = 'upload' | 'download';

export interface TransferredFile {
  direction: TransferDirection;
  localPath: string;
  remotePath: string;
  size: number;
}

interface TreeFile {
  /**
   * @description Path segments relative to the tree root.
   */
  segments: string[];
  size: number;
}

function asTransferError(error: unknown, context: string): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new TransferError(`${context}: ${describeError(error)}`);
}

/**
 * All regular files below a local directory, depth first in name order.
 * Symlinks to files are followed; symlinked directories are not descended.
 */
async function walkLocal(root: string, prefix: string[] = []): Promise<TreeFile[]> {
  const dir = path.join(root, ...prefix);
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: TreeFile[] = [];
  for (const entry of entries) {
    const segments = [...prefix, entry.name];
    if (entry.isDirectory()) {
      files.push(...(await walkLocal(root, segments)));
      continue;
    }

    const stats = await fs.promises.stat(path.join(root, ...segments));
    if (stats.isFile()) {
      files.push({ segments, size: stats.size });
    }
  }
  return files;
}

/**
 * Moves files between the local machine and the remote host, one at a time.
 * The first failure stops the transfer; files already copied are kept.
 *
 * Emits `file` with a {@link TransferredFile} after each copy.
 */
export class FileTransfer extends EventEmitter {
  private session: RemoteSession;

  constructor(session: RemoteSession) {
    super();
    this.session = session;
  }

  /**
   * Copy a local file or tree into a remote directory
   */
  async upload(localPath: string, remoteDir: string): Promise<TransferSummary> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(localPath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new TransferError(`Local path ${localPath} does not exist`);
      }
      throw asTransferError(error, `Cannot read local path ${localPath}`);
    }

    const summary: TransferSummary = { files: 0, bytes: 0 };
    const ensured = new Set<string>();

    if (!stats.isDirectory()) {
      const remoteFile = path.posix.join(remoteDir, path.basename(localPath));
      await this.ensureRemoteDir(remoteDir, ensured);
      await this.putOne(localPath, remoteFile, stats.size, summary);
      return summary;
    }

    let files: TreeFile[];
    try {
      files = await walkLocal(localPath);
    } catch (error) {
      throw asTransferError(error, `Cannot read local directory ${localPath}`);
    }

    await this.ensureRemoteDir(remoteDir, ensured);
    for (const file of files) {
      const remoteFile = path.posix.join(remoteDir, ...file.segments);
      await this.ensureRemoteDir(path.posix.dirname(remoteFile), ensured);
      await this.putOne(
        path.join(localPath, ...file.segments),
        remoteFile,
        file.size,
        summary
      );
    }

    return summary;
  }

  /**
   * Copy a remote file or tree into a local directory
   */
  async download(remotePath: string, localDir: string): Promise<TransferSummary> {
    const stat = await this.session.stat(remotePath);
    if (!stat) {
      throw new TransferError(`Remote path ${remotePath} does not exist`);
    }

    const summary: TransferSummary = { files: 0, bytes: 0 };

    if (!stat.isDirectory) {
      const localFile = path.join(localDir, path.posix.basename(remotePath));
      await this.getOne(localFile, remotePath, stat.size, summary);
      return summary;
    }

    const files = await this.walkRemote(remotePath);
    for (const file of files) {
      await this.getOne(
        path.join(localDir, ...file.segments),
        path.posix.join(remotePath, ...file.segments),
        file.size,
        summary
      );
    }

    return summary;
  }

  /**
   * Create a remote directory unless it is already there
   */
  private async ensureRemoteDir(
    remoteDir: string,
    ensured: Set<string>
  ): Promise<void> {
    if (ensured.has(remoteDir)) return;

    const stat = await this.session.stat(remoteDir);
    if (stat === null) {
      const result = await this.session.exec(
        `mkdir -p -- ${shellEscape([remoteDir])}`
      );
      if (result.exitCode !== 0) {
        throw new TransferError(
          `Error creating remote directory ${remoteDir}: ${result.stderr.trim()}`
        );
      }
    } else if (!stat.isDirectory) {
      throw new TransferError(
        `Remote path ${remoteDir} exists and is not a directory`
      );
    }

    ensured.add(remoteDir);
  }

  private async walkRemote(root: string, prefix: string[] = []): Promise<TreeFile[]> {
    const dir = path.posix.join(root, ...prefix);
    const entries = (await this.session.readdir(dir))
      .filter((entry) => entry.name !== '.' && entry.name !== '..')
      .sort((a, b) => a.name.localeCompare(b.name));

    const files: TreeFile[] = [];
    for (const entry of entries) {
      const segments = [...prefix, entry.name];
      if (entry.stat.isDirectory) {
        files.push(...(await this.walkRemote(root, segments)));
        continue;
      }

      let stat = entry.stat;
      if (!stat.isFile) {
        // symlinks come back unresolved from readdir
        const target = await this.session.stat(path.posix.join(root, ...segments));
        if (!target) continue;
        stat = target;
      }
      if (stat.isFile) {
        files.push({ segments, size: stat.size });
      }
    }
    return files;
  }

  private async putOne(
    localPath: string,
    remotePath: string,
    size: number,
    summary: TransferSummary
  ): Promise<void> {
    try {
      await this.session.putFile(localPath, remotePath);
    } catch (error) {
      throw asTransferError(error, `Error uploading ${localPath}`);
    }
    this.record({ direction: 'upload', localPath, remotePath, size }, summary);
  }

  private async getOne(
    localPath: string,
    remotePath: string,
    size: number,
    summary: TransferSummary
  ): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
      await this.session.getFile(localPath, remotePath);
    } catch (error) {
      throw asTransferError(error, `Error downloading ${remotePath}`);
    }
    this.record({ direction: 'download', localPath, remotePath, size }, summary);
  }

  private record(file: TransferredFile, summary: TransferSummary): void {
    summary.files += 1;
    summary.bytes += file.size;
    this.emit('file', file);
  }
}
