export type { AttributeRecord, AttributeStore } from './attribute-store';
export { MemoryAttributeStore, isAttributeStore } from './attribute-store';
export { FileAttributeStore } from './file-attribute-store';
