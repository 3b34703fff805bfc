import { Command } from 'commander';
import { RemoteExecutor, connectRemote } from '../../classes/remote-executor';
import { DEFAULT_CONFIG_PATH, getRemoteTarget, loadConfig } from '../../lib/config';
import { resolveConnectionConfig } from '../../lib/credentials';
import { sanitizeFilePath } from '../../lib/sanitization';
import { reportError } from './report';
import chalk from 'chalk';

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts ssh-test --config config.json
  program
    .command('ssh-test')
    .description('Test the SSH connection described by remote_config')
    .option(
      '-c, --config <path>',
      'Path to config file',
      process.env.PIPELINE_CONFIG || DEFAULT_CONFIG_PATH
    )
    .option(
      '--insecure-accept-new-host-keys',
      'Trust hosts missing from known_hosts for this run'
    )
    .action(
      async (options: { config: string; insecureAcceptNewHostKeys?: boolean }) => {
        console.log(chalk.bold('🔐 Testing SSH Connection...'));

        let executor: RemoteExecutor | null = null;

        try {
          const configPath = sanitizeFilePath(options.config, 'Config path');
          const config = await loadConfig(configPath);
          const target = getRemoteTarget(config);
          if (options.insecureAcceptNewHostKeys) {
            target.strictHostKeyChecking = false;
          }

          console.log(
            chalk.dim(`Connecting to ${target.user}@${target.host}:${target.port}\n`)
          );

          const remoteConfig = resolveConnectionConfig(target);
          const { agent, privateKeyPath, password } = remoteConfig.ssh;
          if (agent) {
            console.log(chalk.blue('🔑 Using SSH agent'));
          }
          if (privateKeyPath) {
            console.log(chalk.blue(`🔑 Using private key ${privateKeyPath}`));
          }
          if (password) {
            console.log(chalk.yellow('⚠️  Using password authentication'));
          }
          if (!target.strictHostKeyChecking) {
            console.log(
              chalk.yellow('⚠️  Host key checking disabled for unknown hosts')
            );
          }

          console.log(chalk.dim('Establishing connection...'));
          executor = await connectRemote(remoteConfig);

          console.log(chalk.dim('Testing connection...'));
          const isConnected = await executor.testConnection();

          if (!isConnected) {
            console.log(chalk.red('❌ SSH connection test failed'));
            process.exitCode = 1;
            return;
          }

          console.log(chalk.green('✅ SSH connection test successful!'));

          try {
            const serverInfo = await executor.getServerInfo();
            console.log(chalk.dim('\n📋 Server Information:'));
            console.log(chalk.cyan(`   Hostname: ${serverInfo.hostname}`));
            console.log(chalk.cyan(`   Uptime: ${serverInfo.uptime}`));
          } catch (error) {
            console.log(chalk.yellow('⚠️  Could not retrieve server information'));
          }
        } catch (error) {
          reportError(error);
          process.exitCode = 1;
        } finally {
          if (executor) {
            await executor.dispose();
            console.log(chalk.dim('Connection closed'));
          }
        }
      }
    );
}
