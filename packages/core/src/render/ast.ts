/**
 * Parse tree for the template dialect
 */

export type Operand =
  | { kind: 'field'; path: string[] } // .a.b
  | { kind: 'dot' }
  | { kind: 'variable'; name: string; path: string[] } // $x.a.b
  | { kind: 'function'; name: string }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'nil' }
  | { kind: 'pipeline'; pipeline: Pipeline };

export interface Command {
  operands: Operand[];
  line: number;
}

export interface Pipeline {
  line: number;
  declarations: string[];
  assign: boolean; // `=` rather than `:=`
  commands: Command[];
}

export interface TextNode {
  kind: 'text';
  text: string;
}

export interface ActionNode {
  kind: 'action';
  line: number;
  pipeline: Pipeline;
}

export interface BranchNode {
  kind: 'if' | 'range' | 'with';
  line: number;
  pipeline: Pipeline;
  body: TemplateNode[];
  otherwise?: TemplateNode[];
}

export interface IncludeNode {
  kind: 'template';
  line: number;
  name: string;
  pipeline?: Pipeline;
}

export type TemplateNode = TextNode | ActionNode | BranchNode | IncludeNode;

export interface ParsedTemplate {
  name: string;
  root: TemplateNode[];
  defines: Map<string, TemplateNode[]>;
}
