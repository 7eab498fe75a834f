export { JsonDocumentRenderer } from './json_document_renderer';
