export * from './zig';
export { cleanDocComment, extractDescriptionOnly, extractDocLine, extractContainerDocLine } from './doc-comment';
