export { reorderDeclarations, collectDeclarations, sortDeclarations, renderDeclarations, compareDeclarations } from './reorder';
export type { Declaration } from './reorder';
export {
  classifyNode,
  getPriority,
  getGroup,
  methodTypeRank,
  classAnnotationRank,
  getBuiltinVirtualRank,
  BUILTIN_VIRTUAL_METHODS,
} from './classify';
export type { Classification, DeclarationKind, DeclarationGroup, MethodType } from './classify';
