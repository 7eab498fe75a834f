import type {
  CertificateContext,
  DocumentRenderer,
  RenderedDocument,
} from '../document_renderer';

/**
 * Keeps rendered contexts in memory. Assignees passed to failFor() make
 * render() throw.
 */
export class MemoryDocumentRenderer implements DocumentRenderer {
  readonly rendered: CertificateContext[] = [];
  private readonly failing = new Set<string>();

  async render(context: CertificateContext): Promise<RenderedDocument> {
    if (this.failing.has(context.assigneeId)) {
      throw new Error(`template engine failed for ${context.assigneeId}`);
    }
    this.rendered.push(context);
    return { reference: `memory://act/${this.rendered.length}` };
  }

  failFor(assigneeId: string): void {
    this.failing.add(assigneeId);
  }

  recover(assigneeId: string): void {
    this.failing.delete(assigneeId);
  }
}
