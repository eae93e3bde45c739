export { OutputCompiler, reportLocatorFor, type CompileMode, type CompileRequest, type CompileResult } from './compiler.js';
export {
  CSV_CONTENT_TYPE,
  inspectArtifact,
  metadataToRow,
  parseArtifact,
  serializeRows,
  type CsvRow,
  type ParsedArtifact,
} from './csv.js';
export { generateReport, NULL_XEV_LABEL, valueCounts } from './report.js';
