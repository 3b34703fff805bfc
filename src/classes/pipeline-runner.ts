import { EventEmitter } from 'events';
import {
  PipelineConfigFile,
  PipelineRunResult,
  PipelineState,
  SessionConnector,
} from '../interfaces';
import { getPipeline } from '../lib/config';
import { formatCommand } from '../lib/command-template';
import { CommandError, PipelineError } from '../lib/errors';
import { withSession } from '../lib/session';
import { FileTransfer, TransferredFile } from './file-transfer';
import { sshConnector } from './remote-executor';

/**
 * Runs one configured pipeline: upload the input tree, execute the command,
 * download the output tree. Steps run strictly in order and the first
 * failure ends the run.
 *
 * Events:
 * - `state` (state: PipelineState) on every transition
 * - `file` (file: TransferredFile) after each copied file
 * - `command` (command: string) right before execution
 * - `stdout` (output: string) when the command succeeded
 */
export class PipelineRunner extends EventEmitter {
  private config: PipelineConfigFile;
  private connector: SessionConnector;
  private currentState: PipelineState = 'idle';

  constructor(config: PipelineConfigFile, connector?: SessionConnector) {
    super();
    this.config = config;
    this.connector = connector ?? sshConnector(config);
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(
    pipelineName: string,
    inputPath: string,
    outputPath: string
  ): Promise<PipelineRunResult> {
    if (this.currentState !== 'idle') {
      throw new PipelineError(
        `Runner already used (state: ${this.currentState})`
      );
    }

    const startTime = Date.now();

    try {
      // nothing below connects before the pipeline is known to be valid
      const pipeline = getPipeline(this.config, pipelineName);
      const paths = pipeline.remote_paths;
      const command = formatCommand(pipeline.pipeline_command, paths);

      const result = await withSession(this.connector, async (session) => {
        this.transition('connected');

        const transfer = new FileTransfer(session);
        transfer.on('file', (file: TransferredFile) => this.emit('file', file));

        const uploaded = await transfer.upload(inputPath, paths.input_dir);
        this.transition('uploaded');

        this.emit('command', command);
        const execution = await session.exec(command);
        if (execution.exitCode !== 0) {
          throw new CommandError(
            execution.exitCode,
            execution.stdout,
            execution.stderr
          );
        }
        this.emit('stdout', execution.stdout);
        this.transition('executed');

        const downloaded = await transfer.download(paths.output_dir, outputPath);
        this.transition('downloaded');

        return {
          pipeline: pipelineName,
          command,
          stdout: execution.stdout,
          uploaded,
          downloaded,
          duration: Date.now() - startTime,
        };
      });

      this.transition('done');
      return result;
    } catch (error) {
      this.transition('failed');
      throw error;
    }
  }

  private transition(state: PipelineState): void {
    this.currentState = state;
    this.emit('state', state);
  }
}
