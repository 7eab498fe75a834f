import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonDocumentRenderer } from './json_document_renderer';
import type { CertificateContext } from '../document_renderer';

describe('JsonDocumentRenderer', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'json-renderer-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write the context as JSON and return its path', async () => {
    const outputDir = path.join(tempDir, 'acts');
    const context: CertificateContext = {
      assigneeId: '100',
      fio: 'Ivanova A. B.',
      post: 'Engineer',
      listCode: 'A',
      listTitle: 'Roof',
      problemNumbers: [1, 2],
      problems: [
        { listCode: 'A', number: 1, title: 'Gutter' },
        { listCode: 'A', number: 2, title: 'Tiles' },
      ],
      generatedOn: '2025-03-10',
    };

    const { reference } = await new JsonDocumentRenderer(outputDir).render(context);

    expect(path.dirname(reference)).toBe(outputDir);
    expect(path.basename(reference)).toMatch(/^act-100-2025-03-10-\d+\.json$/);
    expect(JSON.parse(fs.readFileSync(reference, 'utf-8'))).toEqual(context);
  });
});
