export * from './column-types';
export { nameOf, assertTypeNameDefinition, type TypeNameDefinition } from './type-names';
