export interface RemotePaths {
  /**
   * @description Remote directory receiving the local input tree.
   */
  input_dir: string;
  /**
   * @description Remote directory the command writes its results to.
   */
  output_dir: string;
  /**
   * @description Remote database path handed to the command.
   */
  database: string;
}

export interface PipelineDefinition {
  remote_paths: RemotePaths;
  /**
   * @description Shell command with {input_dir}, {output_dir} and {database} placeholders.
   */
  pipeline_command: string;
}

/**
 * Parsed config file. Pipeline entries are checked when they are looked up.
 */
export interface PipelineConfigFile {
  remote_config: Record<string, unknown>;
  [pipelineName: string]: unknown;
}

/**
 * The remote_config section once its fields have been checked.
 */
export interface RemoteTarget {
  host: string;
  user: string;
  port: number;
  identityFile?: string;
  knownHostsFile: string;
  strictHostKeyChecking: boolean;
}

export type PipelineState =
  | 'idle'
  | 'connected'
  | 'uploaded'
  | 'executed'
  | 'downloaded'
  | 'done'
  | 'failed';

export interface TransferSummary {
  files: number;
  bytes: number;
}

export interface PipelineRunResult {
  pipeline: string;
  command: string;
  stdout: string;
  uploaded: TransferSummary;
  downloaded: TransferSummary;
  duration: number;
}
