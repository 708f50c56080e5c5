import { readFile } from 'node:fs/promises';

import { RecordFileSchema } from '../validation/schemas';

/**
 * Extract-stage contract: yields raw, unvalidated record items.
 * Each item is validated by the transform, so one bad item never fails a read.
 */
export interface RecordSource {
  read(): Promise<unknown[]>;
}

/**
 * Records from a JSON file holding an array or `{ "records": [...] }`.
 */
export class JsonFileRecordSource implements RecordSource {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async read(): Promise<unknown[]> {
    const content = await readFile(this.filePath, 'utf8');
    const parsed: unknown = JSON.parse(content);
    const result = RecordFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(
        `${this.filePath}: expected an array of records or an object with a "records" array`,
      );
    }
    return result.data;
  }
}
