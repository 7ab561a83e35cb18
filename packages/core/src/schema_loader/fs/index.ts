export { FileSchemaLoader } from './file_schema_loader';
