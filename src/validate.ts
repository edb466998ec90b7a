import type { HostTypes, Node } from './ast'
import { UnboundSignalError } from './errors'

/**
 * Checks that every `break` and `continue` in the tree has a loop to receive it.
 * An unlabelled signal needs some enclosing loop; a labelled one needs an enclosing loop with
 * that label. Host statements are opaque and not inspected.
 *
 * @param node - The root node to validate.
 * @throws {UnboundSignalError} If a signal has no receiving loop.
 */
export const validate = <T extends HostTypes>(node: Node<T>): void => {
  visit(node, [])
}

/** Labels of the enclosing loops, innermost last; unlabelled loops push `undefined`. */
type LoopStack = (string | undefined)[]

const visit = <T extends HostTypes>(node: Node<T>, loops: LoopStack): void => {
  switch (node.kind) {
    case 'Block':
      node.body.forEach((stmt) => visit(stmt, loops))
      return
    case 'If':
      visit(node.then, loops)
      if (node.else) visit(node.else, loops)
      return
    case 'ForRange':
    case 'ForEach':
    case 'While':
      visit(node.body, [...loops, node.label])
      return
    case 'Break':
    case 'Continue': {
      const keyword = node.kind === 'Break' ? 'break' : 'continue'
      if (loops.length === 0) {
        throw new UnboundSignalError(`${keyword} outside of any loop`, node.span)
      }
      if (node.label !== undefined && !loops.includes(node.label)) {
        throw new UnboundSignalError(
          `${keyword} ${node.label}: no enclosing loop has that label`,
          node.span
        )
      }
      return
    }
    case 'Return':
    case 'Host':
      return
    default: {
      const exhaustive: never = node
      return exhaustive
    }
  }
}
