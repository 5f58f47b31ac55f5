export {
  PROGRAM_DB_SCHEMA_VERSION,
  SQLiteStorage,
  type SQLiteParam,
  type SQLiteStorageOptions,
  type Storage,
} from "./sqlite.storage";

export {
  CommentStore,
  FunctionStore,
  ProgramMetaStore,
  StringStore,
  XrefStore,
  createSQLiteStorageLayer,
  seedProgramDatabase,
  type CommentRecord,
  type FunctionRecord,
  type ProgramMetaKey,
  type ProgramSeed,
  type SQLiteStorageLayer,
  type StringRecord,
  type XrefRecord,
} from "./sqlite.stores";

export {
  createProgramDatabaseLoader,
  openProgramDatabase,
  type OpenProgramDatabaseOptions,
  type ProgramDatabase,
} from "./sqlite.program";
