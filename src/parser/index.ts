export {
  DoclingParser,
  PLAIN_TEXT_EXTENSIONS,
  extensionOf,
  isPlainText,
  type DocumentParser,
  type DoclingParserOptions,
  type SourceDocument,
} from './docling.js';
