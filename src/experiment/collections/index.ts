export { DataTable, type DataRow } from './DataTable.js';
export { NumericMatrix } from './NumericMatrix.js';
export { Spectra } from './Spectra.js';
export { QuantTable, type QuantTableInit } from './QuantTable.js';
export { NamedList } from './NamedList.js';
export {
  isCollection,
  isLinkable,
  dimensionsOf,
  defaultSubsetBy,
  elementCount,
  selectElements,
  type Collection,
  type Linkable,
} from './linkable.js';
export type { CollectionKind, FieldContainer, NamedCollection } from './types.js';
