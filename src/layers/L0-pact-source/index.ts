export {
  createPactReader,
  fetchPactDocument,
  resolvePactSource,
  isWebUri,
  basicAuthHeader,
} from './reader';
export type { PactSource, PactReader, PactReaderOptions } from './reader';
export { parsePactDocument, validatePactDocument, pactDocumentSchema } from './document';
