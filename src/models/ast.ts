/**
 * ast.ts
 * Generic, order-preserving tree produced by the AST readers.
 *
 * The tree is a neutral view of the external elaboration tool's output:
 * every element becomes one node, attributes are kept as strings and sibling
 * order is the document order (which is the HDL declaration order).
 */

export interface AstNode {
  /** Element name, as written by the producer (case preserved). */
  tag: string;
  /** Raw attribute values without any prefix. */
  attrs: Record<string, string>;
  /** Child elements in document order. Text content is not retained. */
  children: AstNode[];
}
