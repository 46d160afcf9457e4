export { Template } from './template.js';
export type {
  BuildOptions,
  TemplateArguments,
  TemplateOptions,
  TemplateValue,
  Variable,
  VariableDeclaration,
  VariableKind,
  VariableType,
} from './template.js';
export { parseTemplate } from './parser.js';
export type { TemplateNode } from './parser.js';
