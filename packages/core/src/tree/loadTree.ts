import { resolve } from 'path';
import { ForkcovError } from '../errors/ForkcovError.js';
import { silentLogger, type Logger } from '../logging/Logger.js';
import { readJsonFile } from '../utils/readJsonFile.js';
import type { DecoratedTree } from './DecoratedTree.js';
import { buildDecoratedTree } from './TreeBuilder.js';

/** Parsed, not yet validated, tree document */
export function loadTreeDocument(filePath: string): unknown {
  return readJsonFile(filePath);
}

/**
 * Read a tree document and build its arena. Shape errors get the file path
 * added to their context.
 */
export function loadDecoratedTree(filePath: string, logger: Logger = silentLogger): DecoratedTree {
  const document = loadTreeDocument(filePath);
  try {
    return buildDecoratedTree(document, { logger });
  } catch (err) {
    if (err instanceof ForkcovError) {
      err.context.filePath = resolve(filePath);
    }
    throw err;
  }
}
