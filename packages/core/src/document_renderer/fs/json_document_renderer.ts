import { promises as fs } from 'fs';
import * as path from 'path';
import type {
  CertificateContext,
  DocumentRenderer,
  RenderedDocument,
} from '../document_renderer';

/**
 * Writes each certificate context as a JSON document under `outputDir`.
 * A template engine can pick these files up; the core only needs the path.
 */
export class JsonDocumentRenderer implements DocumentRenderer {
  constructor(private readonly outputDir: string) {}

  async render(context: CertificateContext): Promise<RenderedDocument> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const fileName = `act-${context.assigneeId}-${context.generatedOn}-${Date.now()}.json`;
    const filePath = path.join(this.outputDir, fileName);
    await fs.writeFile(filePath, JSON.stringify(context, null, 2), 'utf-8');
    return { reference: filePath };
  }
}
