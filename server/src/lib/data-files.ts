import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// server/src/lib and server/dist/lib both sit two levels below server/data.
const DATA_DIR = new URL('../../data/', import.meta.url);

function dataFilePath(name: string): string {
  return fileURLToPath(new URL(name, DATA_DIR));
}

/**
 * Reads and validates a JSON file from server/data. A malformed file is a
 * deployment error and throws.
 */
export function loadDataFile<T extends z.ZodTypeAny>(name: string, schema: T): z.infer<T> {
  const raw: unknown = JSON.parse(readFileSync(dataFilePath(name), 'utf8'));
  return schema.parse(raw);
}

/** Defers a data file read until first use, then reuses the result. */
export function lazyDataFile<T extends z.ZodTypeAny>(name: string, schema: T): () => z.infer<T> {
  let loaded: { value: z.infer<T> } | null = null;
  return () => {
    if (!loaded) loaded = { value: loadDataFile(name, schema) };
    return loaded.value;
  };
}
