import { Command } from 'commander';
import { registerRunCommand } from './commands/run';
import { registerPipelineCommands } from './commands/pipeline';
import { registerSSHCommands } from './commands/ssh';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('rpr')
    .description(
      'Remote Pipeline Runner - upload inputs, run a configured command over SSH, fetch the results'
    );

  registerRunCommand(program);
  registerPipelineCommands(program);
  registerSSHCommands(program);

  return program;
}
