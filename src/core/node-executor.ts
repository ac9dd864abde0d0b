import { safe } from 'ts-safe';
import type {
  GraphEdge,
  GraphNodeContext,
  GraphNodeEndEvent,
  GraphNodeHistory,
  GraphNodeRouter,
  GraphNodeStartEvent,
} from '../interfaces';
import { END, randomId } from '../shared';
import { GraphExecutionError, toError } from './error';

/**
 * Context required for node execution
 */
interface NodeExecutionContext<S, C> {
  executionId: string;
  name: string;
  node: GraphNodeContext<S, C>;
  /** First edge registered from this node, if any */
  edge?: GraphEdge<S, C>;
  context: C;
  recordExecution: (history: GraphNodeHistory<S>) => void;
  publishEvent: (event: GraphNodeStartEvent<S> | GraphNodeEndEvent<S>) => void;
}

/**
 * Outcome of one step. `next` is absent once the terminal node has run.
 */
export type NodeExecutionResult<S> = {
  next?: string;
  output: S;
};

const resolveRoute = async <S, C>(name: string, router: GraphNodeRouter<S, C>, state: S, context: C) => {
  const next: unknown = await safe(() => router(state, context))
    .catch((error) => {
      throw GraphExecutionError.routingFailed(name, toError(error));
    })
    .unwrap();

  if (typeof next != 'string') throw GraphExecutionError.invalidRouterResult(name, next);
  return next;
};

/**
 * Creates a node executor function that runs the node and determines the next node
 */
export const createNodeExecutor =
  <S, C>({ executionId, name, node, edge, context, recordExecution, publishEvent }: NodeExecutionContext<S, C>) =>
  (input: S): Promise<NodeExecutionResult<S>> => {
    const nodeExecutionId = randomId();
    const startedAt = Date.now();
    let output: { value: S } | undefined;

    publishEvent({
      executionId,
      eventType: 'NODE_START',
      nodeExecutionId,
      startedAt,
      node: { name, input },
    });

    const finish = (history: GraphNodeHistory<S>) => {
      recordExecution(history);
      publishEvent({ executionId, eventType: 'NODE_END', ...history });
    };

    return (
      new Promise<S>((resolve) => resolve(node.execute(input, context)))
        // Wrap node failures with the node name
        .catch((error: unknown) => {
          throw GraphExecutionError.nodeExecutionFailed(name, toError(error));
        })
        // Determine next node from the post-step state
        .then(async (value): Promise<NodeExecutionResult<S>> => {
          output = { value };

          if (name == END) return { output: value };

          if (!edge) throw GraphExecutionError.noOutgoingEdge(name);

          if (edge.type == 'direct') return { next: edge.to, output: value };

          return { next: await resolveRoute(name, edge.router, value, context), output: value };
        })
        .then(
          (result) => {
            finish({
              nodeExecutionId,
              startedAt,
              endedAt: Date.now(),
              isOk: true,
              node: { name, input, output: result.output },
            });
            return result;
          },
          (error: unknown) => {
            const failure = toError(error);
            finish({
              nodeExecutionId,
              startedAt,
              endedAt: Date.now(),
              isOk: false,
              error: failure,
              node: output ? { name, input, output: output.value } : { name, input },
            });
            throw failure;
          }
        )
    );
  };
