export { DocumentSchemaLoader } from './document_schema_loader';
export { FactorySchemaLoader } from './factory_schema_loader';
