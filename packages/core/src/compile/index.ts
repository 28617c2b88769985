export {
  compileBatch,
  unitFromFile,
  unitFromJson,
  unitFromApp,
  type BatchRecord,
  type CompileBatchOptions,
  type CompileUnit,
} from './compileBatch.js';
