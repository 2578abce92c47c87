export { assembleDocument, serializeDocument } from './document_assembler';
