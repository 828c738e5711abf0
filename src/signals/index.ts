export { AlertIngestor, type AlertIngestorOptions, type AlertMetadata, type IngestResult } from './alertIngestor.js';
export { cleanAlertText, parseAlertText, type RawAlert } from './alertParser.js';
export {
  localDateString,
  parseStrictDecimal,
  resolveExpiration,
  signalId,
  validateAlert,
  type ValidationContext
} from './signalValidator.js';
