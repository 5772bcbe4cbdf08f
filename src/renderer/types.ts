// Vector document model produced by the diagram and consumed by the serializer

export type SvgTag = 'svg' | 'defs' | 'marker' | 'g' | 'rect' | 'circle' | 'path' | 'text';

export interface SvgElement {
  tag: SvgTag;
  attrs: Record<string, string>;
  children: SvgElement[];
  text?: string;
}

export type NodeKind =
  | 'state'
  | 'composite'
  | 'history'
  | 'deep-history'
  | 'history-deep-history'
  | 'initial'
  | 'final';

export type Appearance = 'normal' | 'highlighted';
