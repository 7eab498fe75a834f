/**
 * DocumentRenderer port
 *
 * Turns a certificate context into a document. The core never sees the
 * bytes; it only keeps the reference the renderer hands back.
 */

export type CertificateProblem = {
  listCode: string;
  number: number;
  title: string;
};

/**
 * Key-value context for one completion certificate ("act").
 */
export type CertificateContext = {
  assigneeId: string;
  fio: string | null;
  post: string | null;
  /** Code and title of the first list covered, used as the heading */
  listCode: string;
  listTitle: string;
  problemNumbers: number[];
  problems: CertificateProblem[];
  /** YYYY-MM-DD */
  generatedOn: string;
};

export type RenderedDocument = {
  /** Path, URL or id of the produced document */
  reference: string;
};

export interface DocumentRenderer {
  render(context: CertificateContext): Promise<RenderedDocument>;
}
