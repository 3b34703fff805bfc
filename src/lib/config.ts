import * as fs from 'fs';
import {
  PipelineConfigFile,
  PipelineDefinition,
  RemotePaths,
  RemoteTarget,
} from '../interfaces';
import {
  ConfigIncompleteError,
  ConfigMalformedError,
  ConfigNotFoundError,
  ConnectionError,
  PipelineConfigError,
  PipelineError,
  PipelineNotFoundError,
  ValidationError,
  describeError,
  errorCode,
} from './errors';
import {
  expandHome,
  sanitizePort,
  sanitizeSSHHost,
  sanitizeSSHUsername,
} from './sanitization';

export const DEFAULT_CONFIG_PATH = 'config.json';
export const DEFAULT_KNOWN_HOSTS_FILE = '~/.ssh/known_hosts';
export const REMOTE_CONFIG_KEY = 'remote_config';

const REMOTE_PATH_KEYS: (keyof RemotePaths)[] = [
  'input_dir',
  'output_dir',
  'database',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and parses a pipeline config file. Only the presence of the
 * remote_config section is checked here; pipelines are checked on lookup.
 */
export async function loadConfig(
  configPath: string
): Promise<PipelineConfigFile> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(configPath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigNotFoundError(configPath);
    }
    throw new PipelineError(
      `Cannot read config file ${configPath}: ${describeError(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigMalformedError(configPath, describeError(error));
  }

  if (!isRecord(parsed)) {
    throw new ConfigMalformedError(configPath, 'expected a JSON object');
  }

  if (!(REMOTE_CONFIG_KEY in parsed)) {
    throw new ConfigIncompleteError(configPath, REMOTE_CONFIG_KEY);
  }

  const remoteConfig = parsed[REMOTE_CONFIG_KEY];
  if (!isRecord(remoteConfig)) {
    throw new ConfigMalformedError(
      configPath,
      `'${REMOTE_CONFIG_KEY}' must be an object`
    );
  }

  return { ...parsed, remote_config: remoteConfig };
}

/**
 * Names of every pipeline defined in the config, in file order.
 */
export function listPipelines(config: PipelineConfigFile): string[] {
  return Object.keys(config).filter((key) => key !== REMOTE_CONFIG_KEY);
}

/**
 * Looks up a pipeline and checks that it can be run.
 */
export function getPipeline(
  config: PipelineConfigFile,
  name: string
): PipelineDefinition {
  if (
    name === REMOTE_CONFIG_KEY ||
    !Object.prototype.hasOwnProperty.call(config, name)
  ) {
    throw new PipelineNotFoundError(name);
  }

  const entry = config[name];
  if (
    !isRecord(entry) ||
    !('remote_paths' in entry) ||
    !('pipeline_command' in entry)
  ) {
    throw new PipelineConfigError(
      `Invalid pipeline configuration for '${name}'`
    );
  }

  const remotePaths = entry.remote_paths;
  if (!isRecord(remotePaths)) {
    throw new PipelineConfigError(
      `'remote_paths' of pipeline '${name}' must be an object`
    );
  }

  const paths: RemotePaths = { input_dir: '', output_dir: '', database: '' };
  for (const key of REMOTE_PATH_KEYS) {
    const value = remotePaths[key];
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new PipelineConfigError(
        `Pipeline '${name}' is missing remote_paths.${key}`
      );
    }
    paths[key] = value;
  }

  const command = entry.pipeline_command;
  if (typeof command !== 'string' || command.trim().length === 0) {
    throw new PipelineConfigError(
      `'pipeline_command' of pipeline '${name}' must be a non-empty string`
    );
  }

  return { remote_paths: paths, pipeline_command: command };
}

function requireField(
  section: Record<string, unknown>,
  field: 'host' | 'user'
): string {
  const value = section[field];
  if (value === undefined || value === null) {
    throw new ConnectionError(
      `Missing required field in remote_config: ${field}`
    );
  }
  if (typeof value !== 'string') {
    throw new ConnectionError(`remote_config.${field} must be a string`);
  }
  return value;
}

/**
 * Reads the connection target out of remote_config. Called when connecting,
 * so a missing host or user surfaces as a connection failure.
 */
export function getRemoteTarget(config: PipelineConfigFile): RemoteTarget {
  const section = config.remote_config;

  const host = sanitizeSSHHost(requireField(section, 'host'));
  const user = sanitizeSSHUsername(requireField(section, 'user'));
  const port = section.port === undefined ? 22 : sanitizePort(section.port);

  let identityFile: string | undefined;
  if (section.identity_file !== undefined) {
    if (typeof section.identity_file !== 'string') {
      throw new ValidationError('remote_config.identity_file must be a string');
    }
    identityFile = expandHome(section.identity_file);
  }

  let knownHostsFile = DEFAULT_KNOWN_HOSTS_FILE;
  if (section.known_hosts_file !== undefined) {
    if (typeof section.known_hosts_file !== 'string') {
      throw new ValidationError(
        'remote_config.known_hosts_file must be a string'
      );
    }
    knownHostsFile = section.known_hosts_file;
  }

  let strictHostKeyChecking = true;
  if (section.strict_host_key_checking !== undefined) {
    if (typeof section.strict_host_key_checking !== 'boolean') {
      throw new ValidationError(
        'remote_config.strict_host_key_checking must be true or false'
      );
    }
    strictHostKeyChecking = section.strict_host_key_checking;
  }

  return {
    host,
    user,
    port,
    identityFile,
    knownHostsFile: expandHome(knownHostsFile),
    strictHostKeyChecking,
  };
}
