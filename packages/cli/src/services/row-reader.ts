import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';

/**
 * Reads an import file as plain data. JSON and YAML are both accepted
 * (YAML is a superset of JSON). Validation happens in the core.
 *
 * A top-level `rows` key is unwrapped so files can carry a title:
 * `{ title: "Roof", rows: [...] }`.
 */
export async function readRowsFile(filePath: string): Promise<{ rows: unknown; title?: string }> {
  const content = await fs.readFile(filePath, 'utf-8');
  const data: unknown = yaml.load(content, { filename: filePath });

  if (data !== null && typeof data === 'object' && !Array.isArray(data) && 'rows' in data) {
    const title = 'title' in data && typeof data.title === 'string' ? data.title : undefined;
    return { rows: data.rows, title };
  }
  return { rows: data };
}
