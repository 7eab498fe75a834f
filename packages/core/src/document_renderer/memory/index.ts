export { MemoryDocumentRenderer } from './memory_document_renderer';
