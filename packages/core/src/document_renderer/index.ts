export type {
  CertificateContext,
  CertificateProblem,
  DocumentRenderer,
  RenderedDocument,
} from './document_renderer';
