import { promises as fs } from 'fs';
import { CredentialLoadError, describeError } from '../common/procdoc.errors';

/**
 * Reads a single-value secret file. The value itself never appears in an
 * error message.
 */
export async function readSecretFile(
  filePath: string,
  label: string,
): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new CredentialLoadError(
      `Cannot read ${label} file ${filePath}: ${describeError(error)}`,
      { cause: error },
    );
  }
  const secret = content.trim();
  if (!secret) {
    throw new CredentialLoadError(`${label} file ${filePath} is empty`);
  }
  return secret;
}
