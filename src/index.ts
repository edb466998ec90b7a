import { run, runForLoop, runWhileLoop, type RunResult } from './eval/dispatch'
import { validate } from './validate'
import {
  checkRangeParts,
  contradictsDirection,
  generate,
  makeRangeSpec,
  type RangeInit,
  type RangeSpec,
} from './range'
import { fromCollection, fromRange, type LoopSource } from './eval/iterators'
import {
  NORMAL,
  breakSignal,
  continueSignal,
  returnSignal,
  targetsLoop,
  type ControlSignal,
} from './signal'
import { LimitTracker, resolveLimits, type LimitsConfig, type ResolvedLimits } from './limits'
import {
  resolveOptions,
  runOptionsSchema,
  type RunOptions,
  type DirectionMismatchMode,
} from './options'
import type { TraceEvent, TraceEventType, TraceSink, LoopExit, TraceData } from './trace'
import type { Awaitable, CollectionSource, Host, Scope } from './eval/types'
import type {
  BlockNode,
  BreakNode,
  ContinueNode,
  Direction,
  ForEachNode,
  ForNode,
  ForRangeNode,
  HostNode,
  HostTypes,
  IfNode,
  LoopNode,
  Node,
  ReturnNode,
  Span,
  WhileNode,
} from './ast'
import {
  ConfigError,
  DirectionMismatchError,
  EvaluationError,
  InvalidBoundError,
  InvalidStepError,
  LimitError,
  UnboundSignalError,
  isLoopCoreError,
  type ErrorKind,
  type LoopCoreError,
} from './errors'

export { run, runForLoop, runWhileLoop, validate }
export { generate, makeRangeSpec, checkRangeParts, contradictsDirection }
export { fromRange, fromCollection }
export { NORMAL, breakSignal, continueSignal, returnSignal, targetsLoop }
export { LimitTracker, resolveLimits, resolveOptions, runOptionsSchema }
export {
  ConfigError,
  DirectionMismatchError,
  EvaluationError,
  InvalidBoundError,
  InvalidStepError,
  LimitError,
  UnboundSignalError,
  isLoopCoreError,
}
export type { RunResult, RunOptions, DirectionMismatchMode, LimitsConfig, ResolvedLimits }
export type { RangeInit, RangeSpec, LoopSource, ControlSignal }
export type { TraceEvent, TraceEventType, TraceSink, TraceData, LoopExit }
export type { Awaitable, CollectionSource, Host, Scope }
export type {
  BlockNode,
  BreakNode,
  ContinueNode,
  Direction,
  ForEachNode,
  ForNode,
  ForRangeNode,
  HostNode,
  HostTypes,
  IfNode,
  LoopNode,
  Node,
  ReturnNode,
  Span,
  WhileNode,
}
export type { ErrorKind, LoopCoreError }
