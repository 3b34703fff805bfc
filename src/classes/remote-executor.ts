import { Config, NodeSSH } from 'node-ssh';
import type { SFTPWrapper, Stats } from 'ssh2';
import * as fs from 'fs';
import {
  RemoteExecutionConfig,
  ExecutionResult,
  RemoteDirEntry,
  RemoteSession,
  RemoteStat,
  PipelineConfigFile,
  SessionConnector,
} from '../interfaces';
import { getRemoteTarget } from '../lib/config';
import { resolveConnectionConfig } from '../lib/credentials';
import {
  ConnectionError,
  PipelineError,
  TransferError,
  describeError,
  errorCode,
} from '../lib/errors';
import {
  KnownHostEntry,
  fingerprint,
  hostToken,
  parseKnownHosts,
  verifyHostKey,
} from '../lib/known-hosts';

// SSH_FX_NO_SUCH_FILE
const SFTP_NO_SUCH_FILE = 2;

function toRemoteStat(stats: Stats): RemoteStat {
  return {
    isDirectory: stats.isDirectory(),
    isFile: stats.isFile(),
    size: stats.size,
  };
}

export class RemoteExecutor implements RemoteSession {
  private ssh: NodeSSH;
  private sftp: SFTPWrapper | null = null;
  private config: RemoteExecutionConfig;

  constructor(config: RemoteExecutionConfig) {
    this.ssh = new NodeSSH();
    this.config = config;
  }

  /**
   * Connect to the remote server and open the SFTP channel
   */
  async connect(): Promise<void> {
    const { host, port = 22 } = this.config.ssh;
    const { knownHostsFile, strict } = this.config.hostKeys;
    const knownHosts = await this.loadKnownHosts();
    const token = hostToken(host, port);
    let rejection: string | null = null;

    const connectConfig: Config = {
      ...this.config.ssh,
      hostVerifier: (key: Buffer): boolean => {
        const verdict = verifyHostKey(knownHosts, host, port, key);
        const keyFingerprint = fingerprint(key);

        switch (verdict) {
          case 'trusted':
            return true;
          case 'revoked':
            rejection = `Host key ${keyFingerprint} for ${token} is marked as revoked in ${knownHostsFile}`;
            return false;
          case 'mismatch':
            rejection = `Host key for ${token} does not match ${knownHostsFile} (got ${keyFingerprint})`;
            return false;
          case 'unknown':
            if (strict) {
              rejection = `Host ${token} is not in ${knownHostsFile} (key ${keyFingerprint}); add it with ssh-keyscan or set strict_host_key_checking to false`;
              return false;
            }
            console.warn(
              `Warning: accepting unknown host key ${keyFingerprint} for ${token}`
            );
            return true;
        }
      },
    };

    try {
      await this.ssh.connect(connectConfig);
      this.sftp = await this.ssh.requestSFTP();
    } catch (error) {
      this.ssh.dispose();
      throw new ConnectionError(
        `Error connecting to remote host: ${rejection ?? describeError(error)}`
      );
    }
  }

  /**
   * Close the SFTP channel and the SSH session
   */
  async dispose(): Promise<void> {
    if (this.sftp) {
      this.sftp.end();
      this.sftp = null;
    }
    this.ssh.dispose();
  }

  /**
   * Run one command through the remote shell and wait for it to exit.
   * A command killed by a signal reports exit code -1.
   */
  async exec(command: string): Promise<ExecutionResult> {
    const startTime = Date.now();

    try {
      const result = await this.ssh.execCommand(command);

      return {
        exitCode: result.code ?? -1,
        stdout: result.stdout,
        stderr: result.stderr,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      throw new PipelineError(
        `Error executing remote command: ${describeError(error)}`
      );
    }
  }

  async stat(remotePath: string): Promise<RemoteStat | null> {
    const sftp = this.requireSftp();

    return new Promise<RemoteStat | null>((resolve, reject) => {
      sftp.stat(remotePath, (error, stats) => {
        if (!error) {
          resolve(toRemoteStat(stats));
        } else if (errorCode(error) === SFTP_NO_SUCH_FILE) {
          resolve(null);
        } else {
          reject(
            new TransferError(
              `Cannot stat remote path ${remotePath}: ${error.message}`
            )
          );
        }
      });
    });
  }

  async readdir(remotePath: string): Promise<RemoteDirEntry[]> {
    const sftp = this.requireSftp();

    return new Promise<RemoteDirEntry[]>((resolve, reject) => {
      sftp.readdir(remotePath, (error, list) => {
        if (error) {
          reject(
            new TransferError(
              `Cannot read remote directory ${remotePath}: ${error.message}`
            )
          );
          return;
        }
        resolve(
          list.map((entry) => ({
            name: entry.filename,
            stat: toRemoteStat(entry.attrs),
          }))
        );
      });
    });
  }

  /**
   * Upload one file over the SFTP channel
   */
  async putFile(localPath: string, remotePath: string): Promise<void> {
    try {
      await this.ssh.putFile(localPath, remotePath, this.requireSftp());
    } catch (error) {
      throw new TransferError(
        `Error uploading ${localPath} to ${remotePath}: ${describeError(error)}`
      );
    }
  }

  /**
   * Download one file over the SFTP channel
   */
  async getFile(localPath: string, remotePath: string): Promise<void> {
    try {
      await this.ssh.getFile(localPath, remotePath, this.requireSftp());
    } catch (error) {
      throw new TransferError(
        `Error downloading ${remotePath} to ${localPath}: ${describeError(error)}`
      );
    }
  }

  /**
   * Get remote server information
   */
  async getServerInfo(): Promise<{ hostname: string; uptime: string }> {
    const hostnameResult = await this.ssh.execCommand('hostname');
    const uptimeResult = await this.ssh.execCommand('uptime');

    return {
      hostname: hostnameResult.stdout.trim(),
      uptime: uptimeResult.stdout.trim(),
    };
  }

  /**
   * Test the connection to the remote server
   */
  async testConnection(): Promise<boolean> {
    const result = await this.exec('echo "Connection test successful"');
    return result.exitCode === 0;
  }

  private requireSftp(): SFTPWrapper {
    if (!this.sftp) {
      throw new ConnectionError('Not connected to remote host');
    }
    return this.sftp;
  }

  private async loadKnownHosts(): Promise<KnownHostEntry[]> {
    const { knownHostsFile } = this.config.hostKeys;

    try {
      const text = await fs.promises.readFile(knownHostsFile, 'utf8');
      return parseKnownHosts(text);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw new ConnectionError(
        `Cannot read known hosts file ${knownHostsFile}: ${describeError(error)}`
      );
    }
  }
}

/**
 * Opens a session for the given settings.
 */
export async function connectRemote(
  config: RemoteExecutionConfig
): Promise<RemoteExecutor> {
  const executor = new RemoteExecutor(config);
  await executor.connect();
  return executor;
}

export interface ConnectorOptions {
  /**
   * @description Accept hosts missing from known_hosts for this run.
   */
  acceptNewHostKeys?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Connector that reads remote_config when it is called, so a config without
 * host or user only fails once a connection is attempted.
 */
export function sshConnector(
  config: PipelineConfigFile,
  options: ConnectorOptions = {}
): SessionConnector {
  return async () => {
    const target = getRemoteTarget(config);
    if (options.acceptNewHostKeys) {
      target.strictHostKeyChecking = false;
    }
    return connectRemote(resolveConnectionConfig(target, options.env));
  };
}
