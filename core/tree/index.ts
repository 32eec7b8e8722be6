/**
 * File tree generation for fskit
 *
 * @module tree
 */

export {
  FileTreeBuilder,
  type BuildReport,
  type CopyDirPatterns,
  type FileTreeBuilderOptions,
  type TreeStep,
} from './builder.js'
export { renderTemplate, type TemplateValue, type TemplateVars } from './template.js'
