import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as fs from 'fs';
import * as path from 'path';
import { FileTransfer, TransferredFile } from '../src/classes/file-transfer';
import { TransferError } from '../src/lib/errors';
import {
  LocalSession,
  makeTempDir,
  readTree,
  writeTree,
} from './helpers/local-session';
import { captureError } from './helpers/capture';

describe('FileTransfer', () => {
  let localDir: string;
  let remoteRoot: string;
  let session: LocalSession;
  let transfer: FileTransfer;

  beforeEach(async () => {
    localDir = await makeTempDir('local');
    remoteRoot = await makeTempDir('remote');
    session = new LocalSession(remoteRoot);
    transfer = new FileTransfer(session);
  });

  afterEach(async () => {
    await fs.promises.rm(localDir, { recursive: true, force: true });
    await fs.promises.rm(remoteRoot, { recursive: true, force: true });
  });

  describe('upload', () => {
    it('should copy a tree preserving relative paths', async () => {
      const input = path.join(localDir, 'input');
      await writeTree(input, {
        'a.txt': 'A',
        'sub/b.txt': 'BB',
        'sub/deep/c.txt': 'CCC',
      });

      const events: TransferredFile[] = [];
      transfer.on('file', (file: TransferredFile) => events.push(file));

      const summary = await transfer.upload(input, '/data/in');

      expect(summary).to.deep.equal({ files: 3, bytes: 6 });
      expect(await readTree(session.resolve('/data/in'))).to.deep.equal({
        'a.txt': 'A',
        'sub/b.txt': 'BB',
        'sub/deep/c.txt': 'CCC',
      });
      expect(session.calls).to.deep.equal([
        'exec:mkdir -p -- /data/in',
        'put:/data/in/a.txt',
        'exec:mkdir -p -- /data/in/sub',
        'put:/data/in/sub/b.txt',
        'exec:mkdir -p -- /data/in/sub/deep',
        'put:/data/in/sub/deep/c.txt',
      ]);
      expect(events.map((event) => event.remotePath)).to.deep.equal([
        '/data/in/a.txt',
        '/data/in/sub/b.txt',
        '/data/in/sub/deep/c.txt',
      ]);
      expect(events[1]).to.deep.equal({
        direction: 'upload',
        localPath: path.join(input, 'sub', 'b.txt'),
        remotePath: '/data/in/sub/b.txt',
        size: 2,
      });
    });

    it('should reproduce the same layout when repeated', async () => {
      const input = path.join(localDir, 'input');
      await writeTree(input, { 'a.txt': 'A', 'sub/b.txt': 'B' });

      await transfer.upload(input, '/data/in');
      const first = await readTree(session.resolve('/data/in'));
      session.calls.length = 0;

      await transfer.upload(input, '/data/in');

      expect(await readTree(session.resolve('/data/in'))).to.deep.equal(first);
      expect(session.calls).to.deep.equal([
        'put:/data/in/a.txt',
        'put:/data/in/sub/b.txt',
      ]);
    });

    it('should copy a single file into the remote directory', async () => {
      await writeTree(localDir, { 'reads.fq': '@r1' });

      const summary = await transfer.upload(
        path.join(localDir, 'reads.fq'),
        '/data/in'
      );

      expect(summary).to.deep.equal({ files: 1, bytes: 3 });
      expect(session.calls).to.deep.equal([
        'exec:mkdir -p -- /data/in',
        'put:/data/in/reads.fq',
      ]);
    });

    it('should end mkdir options before a remote directory starting with a dash', async () => {
      await writeTree(localDir, { 'reads.fq': '@r1' });

      await transfer.upload(path.join(localDir, 'reads.fq'), '-scratch');

      expect(session.calls).to.deep.equal([
        'exec:mkdir -p -- -scratch',
        'put:-scratch/reads.fq',
      ]);
      expect(await readTree(session.resolve('-scratch'))).to.deep.equal({
        'reads.fq': '@r1',
      });
    });

    it('should quote a remote directory containing spaces', async () => {
      await writeTree(localDir, { 'reads.fq': '@r1' });

      await transfer.upload(path.join(localDir, 'reads.fq'), '/data/run one');

      expect(session.calls).to.deep.equal([
        "exec:mkdir -p -- '/data/run one'",
        'put:/data/run one/reads.fq',
      ]);
    });

    it('should fail before touching the remote side when the source is missing', async () => {
      const missing = path.join(localDir, 'nope');

      const error = await captureError(transfer.upload(missing, '/data/in'));

      expect(error)
        .to.be.instanceOf(TransferError)
        .with.property('message', `Local path ${missing} does not exist`);
      expect(session.calls).to.deep.equal([]);
    });

    it('should fail when a remote directory cannot be created', async () => {
      await writeTree(localDir, { 'a.txt': 'A' });
      session.failMkdir = true;

      const error = await captureError(transfer.upload(localDir, '/data/in'));

      expect(error)
        .to.be.instanceOf(TransferError)
        .with.property(
          'message',
          'Error creating remote directory /data/in: mkdir: permission denied'
        );
      expect(session.calls).to.deep.equal(['exec:mkdir -p -- /data/in']);
    });

    it('should keep files copied before a failure', async () => {
      await writeTree(localDir, { 'a.txt': 'A', 'b.txt': 'B', 'c.txt': 'C' });
      const putFile = session.putFile.bind(session);
      session.putFile = async (localPath: string, remotePath: string) => {
        if (remotePath.endsWith('b.txt')) {
          throw new Error('disk full');
        }
        return putFile(localPath, remotePath);
      };

      const error = await captureError(transfer.upload(localDir, '/data/in'));

      expect(error)
        .to.be.instanceOf(TransferError)
        .with.property(
          'message',
          `Error uploading ${path.join(localDir, 'b.txt')}: disk full`
        );
      expect(await readTree(session.resolve('/data/in'))).to.deep.equal({
        'a.txt': 'A',
      });
    });
  });

  describe('download', () => {
    it('should copy the remote tree into the local directory', async () => {
      await writeTree(session.resolve('/data/out'), {
        'report.html': '<p>ok</p>',
        'tables/counts.tsv': 'x\t1',
      });
      const output = path.join(localDir, 'results');

      const summary = await transfer.download('/data/out', output);

      expect(summary).to.deep.equal({ files: 2, bytes: 12 });
      expect(await readTree(output)).to.deep.equal({
        'report.html': '<p>ok</p>',
        'tables/counts.tsv': 'x\t1',
      });
      expect(session.calls).to.deep.equal([
        'get:/data/out/report.html',
        'get:/data/out/tables/counts.tsv',
      ]);
    });

    it('should copy a single remote file', async () => {
      await writeTree(session.resolve('/data/out'), { 'summary.txt': 'done' });

      await transfer.download('/data/out/summary.txt', localDir);

      expect(await readTree(localDir)).to.deep.equal({ 'summary.txt': 'done' });
    });

    it('should fail when the remote path does not exist', async () => {
      const error = await captureError(transfer.download('/data/out', localDir));

      expect(error)
        .to.be.instanceOf(TransferError)
        .with.property('message', 'Remote path /data/out does not exist');
    });
  });
});
