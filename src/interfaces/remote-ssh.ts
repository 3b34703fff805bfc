export interface SSHConnectionConfig {
  host: string;
  port?: number; // default 22
  username: string;

  // discovered from the agent, identity_file or the environment
  agent?: string;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
  readyTimeout?: number;
}

export interface HostKeyPolicy {
  /**
   * @description Path of the OpenSSH known_hosts file.
   */
  knownHostsFile: string;
  /**
   * @description Reject hosts missing from known_hosts when true.
   */
  strict: boolean;
}

export interface RemoteExecutionConfig {
  ssh: SSHConnectionConfig;
  hostKeys: HostKeyPolicy;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}

export interface RemoteStat {
  isDirectory: boolean;
  isFile: boolean;
  size: number;
}

export interface RemoteDirEntry {
  name: string;
  stat: RemoteStat;
}

/**
 * A connected shell plus file-transfer channel. Paths are POSIX paths on the
 * remote host.
 */
export interface RemoteSession {
  exec(command: string): Promise<ExecutionResult>;
  /**
   * @returns null when nothing exists at the path.
   */
  stat(remotePath: string): Promise<RemoteStat | null>;
  readdir(remotePath: string): Promise<RemoteDirEntry[]>;
  putFile(localPath: string, remotePath: string): Promise<void>;
  getFile(localPath: string, remotePath: string): Promise<void>;
  dispose(): Promise<void>;
}

export type SessionConnector = () => Promise<RemoteSession>;
