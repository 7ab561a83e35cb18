export {
  TallyError,
  ParsingError,
  ConfigError,
  DetailedValidationError,
  ProjectConflictError,
  ModelError,
  TransactionError,
} from './errors';
