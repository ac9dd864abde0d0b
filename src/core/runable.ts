import type {
  CompiledGraph,
  GraphEvent,
  GraphInvokeOptions,
  GraphEdge,
  GraphNodeContext,
  GraphNodeHistory,
  GraphResult,
} from '../interfaces';
import { END, createPubSub, randomId } from '../shared';
import { createNodeExecutor } from './node-executor';
import { GraphExecutionError, toError } from './error';

/**
 * Frozen copy of a builder's definition
 */
type GraphSnapshot<S, C> = {
  readonly nodes: ReadonlyMap<string, GraphNodeContext<S, C>>;
  readonly edges: readonly GraphEdge<S, C>[];
  readonly entryPoint: string;
};

/**
 * Creates a runnable graph from a compiled registry snapshot
 */
export const createGraphRunnable = <S, C>(registry: GraphSnapshot<S, C>): CompiledGraph<S, C> => {
  const { publish, subscribe, unsubscribe } = createPubSub<GraphEvent<S>>();
  const { nodes, edges, entryPoint } = registry;

  /**
   * Executes the graph from the entry point, recording each step in `histories`
   */
  const execute = (
    input: S,
    context: C,
    options: Partial<GraphInvokeOptions> | undefined,
    histories: GraphNodeHistory<S>[]
  ) => {
    const opt: GraphInvokeOptions = { maxNodeVisits: Infinity, ...options };
    const executionId = randomId();
    const startedAt = Date.now();
    let visits = 0;

    const recordExecution = (history: GraphNodeHistory<S>) => {
      histories.push(history);
    };

    const runNode = (name: string, state: S): Promise<S> => {
      const node = nodes.get(name);
      if (!node) {
        // reaching an unregistered END terminates without a final step
        if (name == END) return new Promise<S>((resolve) => resolve(state));
        throw GraphExecutionError.nodeNotFound(name);
      }

      if (++visits > opt.maxNodeVisits) throw GraphExecutionError.maxVisitsExceeded(name, opt.maxNodeVisits);

      const run = createNodeExecutor({
        executionId,
        name,
        node,
        edge: edges.find((edge) => edge.from == name),
        context,
        recordExecution,
        publishEvent: publish,
      });

      return run(state).then(({ next, output }) => (next === undefined ? output : runNode(next, output)));
    };

    publish({ executionId, eventType: 'WORKFLOW_START', startedAt, input });

    return new Promise<S>((resolve) => resolve(runNode(entryPoint, input))).then(
      (output) => {
        publish({
          executionId,
          eventType: 'WORKFLOW_END',
          startedAt,
          endedAt: Date.now(),
          histories,
          isOk: true,
          output,
        });
        return output;
      },
      (error: unknown) => {
        const failure = toError(error);
        publish({
          executionId,
          eventType: 'WORKFLOW_END',
          startedAt,
          endedAt: Date.now(),
          histories,
          isOk: false,
          error: failure,
        });
        throw failure;
      }
    );
  };

  return {
    entryPoint,
    subscribe,
    unsubscribe,

    invoke(input, context, options) {
      return execute(input, context, options, []);
    },

    /**
     * Executes the graph and reports the outcome instead of rejecting
     */
    run(input, context, options) {
      const startedAt = Date.now();
      const histories: GraphNodeHistory<S>[] = [];

      return execute(input, context, options, histories).then(
        (output): GraphResult<S> => ({ startedAt, endedAt: Date.now(), histories, isOk: true, output }),
        (error: unknown): GraphResult<S> => ({
          startedAt,
          endedAt: Date.now(),
          histories,
          isOk: false,
          error: toError(error),
        })
      );
    },
  };
};
