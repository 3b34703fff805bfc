import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { PipelineRunner } from '../../classes/pipeline-runner';
import { TransferredFile } from '../../classes/file-transfer';
import { sshConnector } from '../../classes/remote-executor';
import { PipelineState } from '../../interfaces';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../../lib/config';
import { CommandError } from '../../lib/errors';
import {
  sanitizeFilePath,
  sanitizePipelineName,
} from '../../lib/sanitization';
import { reportError } from './report';

interface RunOptions {
  name: string;
  input: string;
  output: string;
  config: string;
  insecureAcceptNewHostKeys?: boolean;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function printState(state: PipelineState) {
  switch (state) {
    case 'connected':
      console.log(chalk.green('✓ Connected to remote host'));
      console.log(chalk.bold('📤 Transferring input files to remote host...'));
      break;
    case 'uploaded':
      console.log(chalk.green('✓ Input files transferred'));
      break;
    case 'executed':
      console.log(
        chalk.bold('📥 Transferring results back to local machine...')
      );
      break;
    case 'downloaded':
      console.log(chalk.green('✓ Results transferred'));
      break;
    default:
      break;
  }
}

export function registerRunCommand(program: Command) {
  // example: npx tsx src/cli/index.ts --name assemble --input ./reads --output ./results --config config.json
  program
    .command('run', { isDefault: true })
    .description(
      'Upload inputs, run a pipeline on the remote host and download its results'
    )
    .requiredOption('-n, --name <name>', 'Name of the pipeline to run')
    .requiredOption('-i, --input <path>', 'Local input directory')
    .requiredOption('-o, --output <path>', 'Local output directory')
    .option(
      '-c, --config <path>',
      'Path to config file',
      process.env.PIPELINE_CONFIG || DEFAULT_CONFIG_PATH
    )
    .option(
      '--insecure-accept-new-host-keys',
      'Trust hosts missing from known_hosts for this run'
    )
    .action(async (options: RunOptions) => {
      try {
        const pipelineName = sanitizePipelineName(options.name);
        const inputPath = sanitizeFilePath(options.input, 'Input path');
        const outputPath = sanitizeFilePath(options.output, 'Output path');
        const configPath = sanitizeFilePath(options.config, 'Config path');

        await fs.promises.mkdir(outputPath, { recursive: true });

        const config = await loadConfig(configPath);
        const runner = new PipelineRunner(
          config,
          sshConnector(config, {
            acceptNewHostKeys: options.insecureAcceptNewHostKeys,
          })
        );

        console.log(chalk.bold(`🚀 Running pipeline "${pipelineName}"`));
        console.log(chalk.dim(`Config: ${configPath}`));

        runner.on('state', printState);
        runner.on('file', (file: TransferredFile) => {
          const arrow = file.direction === 'upload' ? '↑' : '↓';
          console.log(
            chalk.dim(`   ${arrow} ${file.remotePath} (${formatBytes(file.size)})`)
          );
        });
        runner.on('command', (command: string) => {
          console.log(chalk.bold('⚙️  Executing pipeline command...'));
          console.log(chalk.cyan(`$ ${command}`));
        });
        runner.on('stdout', (output: string) => {
          console.log(chalk.dim('Remote command output:'));
          console.log(output);
        });

        const result = await runner.run(pipelineName, inputPath, outputPath);

        console.log(
          chalk.green('✅ Pipeline execution completed successfully!')
        );
        console.log(
          chalk.dim(
            `Uploaded ${result.uploaded.files} file(s) (${formatBytes(result.uploaded.bytes)}), ` +
              `downloaded ${result.downloaded.files} file(s) (${formatBytes(result.downloaded.bytes)}) ` +
              `in ${(result.duration / 1000).toFixed(1)}s`
          )
        );
      } catch (error) {
        if (error instanceof CommandError) {
          console.error(
            chalk.red(`❌ Remote command failed (exit code ${error.exitCode}):`)
          );
          console.error(error.stderr);
        } else {
          reportError(error);
        }
        process.exit(1);
      }
    });
}
