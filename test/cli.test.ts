import { expect } from 'chai';
import { describe, it, before, after, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { createProgram } from '../src/cli/program';
import { RemoteExecutor } from '../src/classes/remote-executor';
import { makeTempDir } from './helpers/local-session';

describe('CLI', () => {
  let dir: string;
  let configPath: string;
  let sandbox: sinon.SinonSandbox;
  let log: sinon.SinonStub;
  let error: sinon.SinonStub;
  let exit: sinon.SinonStub;
  let chalkLevel: typeof chalk.level;

  before(() => {
    chalkLevel = chalk.level;
    chalk.level = 0;
  });

  after(() => {
    chalk.level = chalkLevel;
  });

  beforeEach(async () => {
    sandbox = sinon.createSandbox();
    dir = await makeTempDir('cli');
    configPath = path.join(dir, 'config.json');
    await fs.promises.writeFile(
      configPath,
      JSON.stringify({
        remote_config: { host: 'compute.example.test', user: 'runner' },
        assemble: {
          remote_paths: {
            input_dir: '/data/in',
            output_dir: '/data/out',
            database: '/db/ref.fa',
          },
          pipeline_command: 'assemble {input_dir} {output_dir} {database}',
        },
        legacy: { pipeline_command: 'old' },
      })
    );
    log = sandbox.stub(console, 'log');
    error = sandbox.stub(console, 'error');
    exit = sandbox.stub(process, 'exit');
  });

  afterEach(async () => {
    sandbox.restore();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  function printed(stub: sinon.SinonStub): string[] {
    return stub.getCalls().map((call) => String(call.args[0]));
  }

  it('should list configured pipelines', async () => {
    await createProgram().parseAsync([
      'node',
      'rpr',
      'pipelines',
      '--config',
      configPath,
    ]);

    const output = printed(log);
    expect(output[0]).to.equal('🌐 Remote host: runner@compute.example.test:22');
    expect(output[1]).to.include('assemble');
    expect(output[1]).to.include('/db/ref.fa');
    expect(output[1]).to.include("Invalid pipeline configuration for 'legacy'");
    expect(exit.called).to.equal(false);
  });

  it('should exit 1 when the config file is missing', async () => {
    const missing = path.join(dir, 'missing.json');
    const output = path.join(dir, 'out');

    await createProgram().parseAsync([
      'node',
      'rpr',
      '--name',
      'assemble',
      '--input',
      path.join(dir, 'in'),
      '--output',
      output,
      '--config',
      missing,
    ]);

    expect(printed(error)).to.deep.equal([
      `✗ Error: Config file ${missing} not found`,
    ]);
    expect(exit.calledOnceWithExactly(1)).to.equal(true);
    expect(fs.existsSync(output)).to.equal(true);
  });

  it('should exit 1 for an unknown pipeline without connecting', async () => {
    await createProgram().parseAsync([
      'node',
      'rpr',
      'run',
      '--name',
      'align',
      '--input',
      path.join(dir, 'in'),
      '--output',
      path.join(dir, 'out'),
      '--config',
      configPath,
    ]);

    expect(printed(error)).to.deep.equal([
      "✗ Error: Pipeline 'align' not found in config",
    ]);
    expect(printed(log)).to.not.include('✓ Connected to remote host');
    expect(exit.calledOnceWithExactly(1)).to.equal(true);
  });

  describe('ssh-test', () => {
    let exitCode: typeof process.exitCode;

    beforeEach(() => {
      exitCode = process.exitCode;
      process.exitCode = undefined;
      sandbox.stub(RemoteExecutor.prototype, 'connect').resolves();
      sandbox.stub(RemoteExecutor.prototype, 'testConnection').resolves(true);
      sandbox.stub(RemoteExecutor.prototype, 'dispose').resolves();
    });

    afterEach(() => {
      process.exitCode = exitCode;
    });

    it('should print the server information', async () => {
      sandbox
        .stub(RemoteExecutor.prototype, 'getServerInfo')
        .resolves({ hostname: 'compute-01', uptime: 'up 3 days' });

      await createProgram().parseAsync([
        'node',
        'rpr',
        'ssh-test',
        '--config',
        configPath,
      ]);

      const output = printed(log);
      expect(output).to.include('✅ SSH connection test successful!');
      expect(output).to.include('   Hostname: compute-01');
      expect(output).to.include('   Uptime: up 3 days');
      expect(output[output.length - 1]).to.equal('Connection closed');
      expect(process.exitCode).to.equal(undefined);
    });

    it('should still pass when the server information cannot be read', async () => {
      sandbox
        .stub(RemoteExecutor.prototype, 'getServerInfo')
        .rejects(new Error('channel closed'));

      await createProgram().parseAsync([
        'node',
        'rpr',
        'ssh-test',
        '--config',
        configPath,
      ]);

      const output = printed(log);
      expect(output).to.include('✅ SSH connection test successful!');
      expect(output).to.include('⚠️  Could not retrieve server information');
      expect(output[output.length - 1]).to.equal('Connection closed');
      expect(printed(error)).to.deep.equal([]);
      expect(process.exitCode).to.equal(undefined);
    });
  });
});
