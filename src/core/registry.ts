import type { GraphBuilder, GraphInvokeContext, GraphRegistryContext } from '../interfaces';
import { createGraphRunnable } from './runable';
import { GraphConfigurationError } from './error';
import { END, isNull } from '../shared';

/**
 * Creates an empty graph definition.
 * Builders are independent of each other; nothing is shared between graphs.
 *
 * @template S - The state type threaded through the graph
 * @template C - The invocation context type
 */
export const createGraph = <S, C = GraphInvokeContext>(): GraphBuilder<S, C> => {
  const context: GraphRegistryContext<S, C> = {
    nodes: new Map(),
    edges: [],
  };

  const validateGraphConnections = (entryPoint: string) => {
    if (entryPoint != END && !context.nodes.has(entryPoint)) {
      throw GraphConfigurationError.nodeNotFound(entryPoint);
    }
    context.edges.forEach((edge) => {
      if (!context.nodes.has(edge.from)) {
        throw GraphConfigurationError.nodeNotFound(edge.from);
      }
      // Conditional targets are only known at execution time
      if (edge.type == 'direct' && edge.to != END && !context.nodes.has(edge.to)) {
        throw GraphConfigurationError.danglingEdge(edge.from, edge.to);
      }
    });
  };

  const registry: GraphBuilder<S, C> = {
    addNode(name, execute) {
      context.nodes.set(name, Object.freeze({ name, execute }));
      return registry;
    },

    addEdge(from, to) {
      context.edges.push(Object.freeze({ type: 'direct' as const, from, to }));
      return registry;
    },

    addConditionalEdge(from, router) {
      context.edges.push(Object.freeze({ type: 'conditional' as const, from, router }));
      return registry;
    },

    setEntryPoint(name) {
      context.entryPoint = name;
      return registry;
    },

    compile(options) {
      const { entryPoint } = context;
      if (isNull(entryPoint) || entryPoint === '') {
        throw GraphConfigurationError.entryPointNotSet();
      }

      if (options?.strict) validateGraphConnections(entryPoint);

      return createGraphRunnable<S, C>({
        nodes: new Map(context.nodes),
        edges: Object.freeze([...context.edges]),
        entryPoint,
      });
    },
  };

  return registry;
};
