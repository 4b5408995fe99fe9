export { InputFileError, readDocumentFile, readJsonFile, writeJsonFile, writeTextFile } from './files.js';
export {
  GroundTruthSchema,
  groundTruthToRecords,
  parseGroundTruth,
  readRecordsFile,
  type GroundTruth,
  type GroundTruthEntry,
} from './records.js';
export { prepareGroundTruth, isRecord } from './audit-fields.js';
