/**
 * Represents a range of characters in the host's source text.
 */
export interface Span {
  start: number
  end: number
}

/**
 * The host-supplied types the node tree is parameterised over.
 * - `expr`: an expression the host knows how to evaluate.
 * - `stmt`: a plain statement the host knows how to execute.
 * - `value`: a runtime value of the host language.
 */
export interface HostTypes {
  expr: unknown
  stmt: unknown
  value: unknown
}

/**
 * A sequence of statements run in order in a fresh scope frame.
 */
export interface BlockNode<T extends HostTypes> {
  kind: 'Block'
  body: Node<T>[]
  span?: Span
}

/**
 * `if cond { then } else { else }`.
 */
export interface IfNode<T extends HostTypes> {
  kind: 'If'
  cond: T['expr']
  then: BlockNode<T>
  else?: BlockNode<T>
  span?: Span
}

/**
 * Direction of a range: `..` and `to` ascend, `downto` descends.
 */
export type Direction = 'ascending' | 'descending'

/**
 * `for x in a..b`, `for x in a to b step s`, `for x in a downto b step s`.
 * Bounds and step are evaluated once, at loop entry.
 */
export interface ForRangeNode<T extends HostTypes> {
  kind: 'ForRange'
  variable: string
  start: T['expr']
  end: T['expr']
  /** Defaults to 1. */
  step?: T['expr']
  direction: Direction
  /** Whether the end bound itself is emitted when reached. Defaults to `true`. */
  inclusive?: boolean
  label?: string
  body: BlockNode<T>
  span?: Span
}

/**
 * `for x in collection`.
 */
export interface ForEachNode<T extends HostTypes> {
  kind: 'ForEach'
  variable: string
  collection: T['expr']
  label?: string
  body: BlockNode<T>
  span?: Span
}

/**
 * `while cond { body }`.
 */
export interface WhileNode<T extends HostTypes> {
  kind: 'While'
  cond: T['expr']
  label?: string
  body: BlockNode<T>
  span?: Span
}

/**
 * `break` or `break label`.
 */
export interface BreakNode {
  kind: 'Break'
  label?: string
  span?: Span
}

/**
 * `continue` or `continue label`.
 */
export interface ContinueNode {
  kind: 'Continue'
  label?: string
  span?: Span
}

/**
 * `return` or `return expr`.
 */
export interface ReturnNode<T extends HostTypes> {
  kind: 'Return'
  value?: T['expr']
  span?: Span
}

/**
 * An opaque statement handed to the host's `execute`.
 */
export interface HostNode<T extends HostTypes> {
  kind: 'Host'
  stmt: T['stmt']
  span?: Span
}

export type LoopNode<T extends HostTypes> = ForRangeNode<T> | ForEachNode<T> | WhileNode<T>

export type ForNode<T extends HostTypes> = ForRangeNode<T> | ForEachNode<T>

export type Node<T extends HostTypes> =
  | BlockNode<T>
  | IfNode<T>
  | LoopNode<T>
  | BreakNode
  | ContinueNode
  | ReturnNode<T>
  | HostNode<T>
