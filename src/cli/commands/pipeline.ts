import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import {
  DEFAULT_CONFIG_PATH,
  getPipeline,
  getRemoteTarget,
  listPipelines,
  loadConfig,
} from '../../lib/config';
import { describeError } from '../../lib/errors';
import { sanitizeFilePath } from '../../lib/sanitization';
import { reportError } from './report';

export function registerPipelineCommands(program: Command) {
  // example: npx tsx src/cli/index.ts pipelines --config config.json
  program
    .command('pipelines')
    .description('List the pipelines defined in a config file')
    .option(
      '-c, --config <path>',
      'Path to config file',
      process.env.PIPELINE_CONFIG || DEFAULT_CONFIG_PATH
    )
    .action(async (options: { config: string }) => {
      try {
        const configPath = sanitizeFilePath(options.config, 'Config path');
        const config = await loadConfig(configPath);

        try {
          const target = getRemoteTarget(config);
          console.log(
            chalk.bold(`🌐 Remote host: ${target.user}@${target.host}:${target.port}`)
          );
        } catch (error) {
          console.log(
            chalk.yellow(`⚠️  remote_config is incomplete: ${describeError(error)}`)
          );
        }

        const names = listPipelines(config);
        if (names.length === 0) {
          console.log(chalk.yellow('No pipelines defined'));
          return;
        }

        const table = new Table({
          head: ['Pipeline', 'Input Dir', 'Output Dir', 'Database', 'Status'],
        });

        for (const name of names) {
          try {
            const pipeline = getPipeline(config, name);
            table.push([
              name,
              pipeline.remote_paths.input_dir,
              pipeline.remote_paths.output_dir,
              pipeline.remote_paths.database,
              chalk.green('OK'),
            ]);
          } catch (error) {
            table.push([name, '-', '-', '-', chalk.red(describeError(error))]);
          }
        }

        console.log(table.toString());
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}
