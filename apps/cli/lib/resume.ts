import { readFile } from 'node:fs/promises';
import { ConfigError, errorMessage } from '@jobscout/core';

/** Resume text is opaque to the pipeline; it only has to exist and be non-empty. */
export async function loadResume(path: string): Promise<string> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    throw new ConfigError(
      missing
        ? `Resume not found at ${path}. Create a plain-text resume file or set RESUME_PATH.`
        : `Cannot read resume at ${path}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  if (!text.trim()) {
    throw new ConfigError(`Resume at ${path} is empty`);
  }
  return text;
}
