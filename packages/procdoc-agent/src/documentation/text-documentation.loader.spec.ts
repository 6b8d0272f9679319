import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DocumentationLoadError } from '../common/procdoc.errors';
import { TextDocumentationLoader } from './text-documentation.loader';

describe('TextDocumentationLoader', () => {
  let dir: string;
  const loader = new TextDocumentationLoader();

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'procdoc-text-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns the file content unchanged', async () => {
    const file = path.join(dir, 'process.txt');
    await fs.writeFile(file, 'Open the invoice list.\n');

    await expect(loader.load(file)).resolves.toBe('Open the invoice list.\n');
  });

  it('rejects a file that is empty after trimming', async () => {
    const file = path.join(dir, 'empty.txt');
    await fs.writeFile(file, '  \n\t\n');

    await expect(loader.load(file)).rejects.toThrow(
      new DocumentationLoadError(`Text documentation ${file} is empty`),
    );
  });

  it('rejects a missing file', async () => {
    await expect(loader.load(path.join(dir, 'missing.txt'))).rejects.toBeInstanceOf(
      DocumentationLoadError,
    );
  });

  it('rejects content that is not UTF-8', async () => {
    const file = path.join(dir, 'latin1.txt');
    await fs.writeFile(file, Buffer.from([0x66, 0xfc, 0x72]));

    await expect(loader.load(file)).rejects.toThrow(
      `Text documentation ${file} is not valid UTF-8`,
    );
  });
});
