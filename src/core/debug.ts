import type { CompiledGraph, GraphEventHandler } from '../interfaces';

/**
 * Prints every execution event of the graph to the console.
 * Returns the handler so it can be passed to `unsubscribe`.
 */
export const graphDebug = <S, C>(graph: CompiledGraph<S, C>): GraphEventHandler<S> => {
  const handler: GraphEventHandler<S> = (e) => {
    switch (e.eventType) {
      case 'WORKFLOW_START': {
        console.log(`GRAPH-START---------`);
        console.dir({ executionId: e.executionId, input: e.input }, { depth: undefined });
        console.log(`--------------------\n\n`);
        return;
      }
      case 'WORKFLOW_END': {
        console.log(`GRAPH-END---------`);
        console.dir(
          {
            executionId: e.executionId,
            path: e.histories.map((h) => h.node.name),
            ...(e.isOk
              ? {
                  output: e.output,
                }
              : {
                  error: e.error,
                }),
          },
          { depth: undefined }
        );
        console.log(`--------------------\n\n`);
        return;
      }
      case 'NODE_START': {
        console.log(`NODE-START---------`);
        console.dir(
          {
            name: e.node.name,
            input: e.node.input,
          },
          { depth: undefined }
        );
        console.log(`--------------------\n\n`);
        return;
      }
      case 'NODE_END': {
        console.log(`NODE-END---------`);
        console.dir(
          {
            name: e.node.name,
            ...(e.isOk
              ? {
                  output: e.node.output,
                }
              : {
                  error: e.error,
                }),
          },
          { depth: undefined }
        );
        console.log(`--------------------\n\n`);
      }
    }
  };

  graph.subscribe(handler);
  return handler;
};
