import { readFileSync } from 'fs';
import { resolve } from 'path';
import { InputError } from '../errors/ForkcovError.js';

/**
 * Read and parse a JSON input file. Both failures raise InputError with the
 * resolved path in context.
 */
export function readJsonFile(filePath: string): unknown {
  const resolvedPath = resolve(filePath);

  let content: string;
  try {
    content = readFileSync(resolvedPath, 'utf-8');
  } catch (err) {
    throw new InputError(
      `Cannot read ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}`,
      'ERR_INPUT_UNREADABLE',
      { filePath: resolvedPath },
      'Check that the file exists and is readable',
    );
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new InputError(
      `${resolvedPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      'ERR_INPUT_NOT_JSON',
      { filePath: resolvedPath },
    );
  }
}
