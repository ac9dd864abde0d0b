export { END } from './shared';

export { createGraph } from './core/registry';

export { graphDebug } from './core/debug';

export {
  GraphConfigurationError,
  GraphError,
  GraphErrorCode,
  GraphExecutionError,
  isGraphError,
} from './core/error';

export type {
  CompiledGraph,
  GraphBuilder,
  GraphCompileOptions,
  GraphEdge,
  GraphEndEvent,
  GraphEvent,
  GraphEventHandler,
  GraphInvokeContext,
  GraphInvokeOptions,
  GraphNodeEndEvent,
  GraphNodeFunction,
  GraphNodeHistory,
  GraphNodeRouter,
  GraphNodeStartEvent,
  GraphResult,
  GraphStartEvent,
} from './interfaces';
