import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CredentialLoadError } from '../common/procdoc.errors';
import { readSecretFile } from './credentials';

describe('readSecretFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'procdoc-secret-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns the trimmed secret', async () => {
    const file = path.join(dir, 'key.txt');
    await fs.writeFile(file, 'test-secret\n');

    await expect(readSecretFile(file, 'API key')).resolves.toBe('test-secret');
  });

  it('rejects an empty file', async () => {
    const file = path.join(dir, 'key.txt');
    await fs.writeFile(file, '\n');

    await expect(readSecretFile(file, 'API key')).rejects.toThrow(
      new CredentialLoadError(`API key file ${file} is empty`),
    );
  });

  it('rejects a missing file without echoing any content', async () => {
    const file = path.join(dir, 'missing.txt');

    await expect(readSecretFile(file, 'Database password')).rejects.toThrow(
      `Cannot read Database password file ${file}: `,
    );
  });
});
