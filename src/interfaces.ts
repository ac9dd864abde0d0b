/**
 * Default invocation context.
 * The engine never reads it; the same object is handed to every node and router call
 * so that nodes can honour cancellation on their own.
 */
export type GraphInvokeContext = {
  /** Cancellation signal for the invocation */
  signal?: AbortSignal;
};

/**
 * A node's transformation function.
 * Receives the current state and returns the next one. Failure is a throw or a rejected promise.
 *
 * @template S - The state type threaded through the graph
 * @template C - The invocation context type
 */
export type GraphNodeFunction<S, C = GraphInvokeContext> = (state: S, context: C) => S | PromiseLike<S>;

/**
 * Function that picks the next node from the state a node just produced.
 * Must return the name of a registered node (or `END`).
 *
 * @template S - The state type threaded through the graph
 * @template C - The invocation context type
 */
export type GraphNodeRouter<S, C = GraphInvokeContext> = (state: S, context: C) => string | PromiseLike<string>;

export type GraphNodeContext<S, C> = {
  readonly name: string;
  readonly execute: GraphNodeFunction<S, C>;
};

/**
 * Outgoing connection of a node.
 * `direct` edges name their target; `conditional` edges compute it at execution time.
 */
export type GraphEdge<S, C> =
  | {
      readonly type: 'direct';
      readonly from: string;
      readonly to: string;
    }
  | {
      readonly type: 'conditional';
      readonly from: string;
      readonly router: GraphNodeRouter<S, C>;
    };

export type GraphRegistryContext<S, C> = {
  nodes: Map<string, GraphNodeContext<S, C>>;
  /** Registration order is lookup order */
  edges: GraphEdge<S, C>[];
  entryPoint?: string;
};

/**
 * Options for compiling a graph.
 */
export interface GraphCompileOptions {
  /**
   * Check node and static edge references at compile time instead of waiting for traversal.
   * Conditional edge targets are still only known at execution time.
   */
  strict: boolean;
}

/**
 * Options for a single invocation.
 */
export interface GraphInvokeOptions {
  /** Maximum number of node executions in one invocation. Unbounded by default. */
  maxNodeVisits: number;
}

/**
 * Records one node execution.
 * A failed entry keeps the node's output when the node itself succeeded but routing did not.
 *
 * @template S - The state type threaded through the graph
 */
export type GraphNodeHistory<S = unknown> = {
  nodeExecutionId: string;
  /** Timestamp when the node execution started */
  startedAt: number;
  /** Timestamp when the node execution ended */
  endedAt: number;
} & (
  | {
      isOk: true;
      error?: undefined;
      node: { name: string; input: S; output: S };
    }
  | {
      isOk: false;
      error: Error;
      node: { name: string; input: S; output?: S };
    }
);

/**
 * Event emitted when an invocation starts.
 */
export type GraphStartEvent<S = unknown> = {
  /** Unique identifier for this execution instance */
  executionId: string;
  eventType: 'WORKFLOW_START';
  startedAt: number;
  input: S;
};

/**
 * Event emitted when an invocation completes, successfully or not.
 */
export type GraphEndEvent<S = unknown> = {
  executionId: string;
  eventType: 'WORKFLOW_END';
  startedAt: number;
  endedAt: number;
  histories: GraphNodeHistory<S>[];
} & ({ isOk: true; error?: undefined; output: S } | { isOk: false; error: Error; output?: undefined });

/**
 * Event emitted when a node begins execution.
 */
export type GraphNodeStartEvent<S = unknown> = {
  executionId: string;
  eventType: 'NODE_START';
  nodeExecutionId: string;
  startedAt: number;
  node: { name: string; input: S };
};

/**
 * Event emitted when a node completes execution.
 */
export type GraphNodeEndEvent<S = unknown> = {
  executionId: string;
  eventType: 'NODE_END';
} & GraphNodeHistory<S>;

export type GraphEvent<S = unknown> =
  | GraphStartEvent<S>
  | GraphEndEvent<S>
  | GraphNodeStartEvent<S>
  | GraphNodeEndEvent<S>;

export type GraphEventHandler<S = unknown> = (event: GraphEvent<S>) => void;

/**
 * Result of `run`: the outcome of an invocation together with its node history.
 */
export type GraphResult<S = unknown> = {
  startedAt: number;
  endedAt: number;
  histories: GraphNodeHistory<S>[];
} & ({ isOk: true; error?: undefined; output: S } | { isOk: false; error: Error; output?: undefined });

/**
 * A compiled, immutable graph.
 * Each invocation is independent; nothing about the graph's nodes, edges or entry point changes between calls.
 *
 * @template S - The state type threaded through the graph
 * @template C - The invocation context type
 */
export interface CompiledGraph<S, C = GraphInvokeContext> {
  /** Name of the node where every invocation begins */
  readonly entryPoint: string;

  /**
   * Runs the graph from the entry point until `END` is reached.
   * @param state - Initial state
   * @param context - Passed unchanged to every node and router call
   * @param options - Per-invocation limits
   * @returns The final state
   * @throws GraphExecutionError when traversal fails; the error carries the offending node name
   */
  invoke(state: S, context: C, options?: Partial<GraphInvokeOptions>): Promise<S>;

  /**
   * Same traversal as `invoke`, but never rejects.
   * Resolves to the outcome with the history of every executed node.
   */
  run(state: S, context: C, options?: Partial<GraphInvokeOptions>): Promise<GraphResult<S>>;

  /**
   * Subscribes to execution events of every invocation of this graph.
   */
  subscribe(handler: GraphEventHandler<S>): void;

  unsubscribe(handler: GraphEventHandler<S>): void;
}

/**
 * Mutable graph definition.
 * None of its methods validate anything; checks happen in `compile` and during traversal.
 *
 * @template S - The state type threaded through the graph
 * @template C - The invocation context type
 */
export interface GraphBuilder<S, C = GraphInvokeContext> {
  /**
   * Registers a node. Registering an existing name replaces the previous node.
   */
  addNode(name: string, execute: GraphNodeFunction<S, C>): GraphBuilder<S, C>;

  /**
   * Appends a static edge. When several edges leave the same node, the first registered one is used.
   */
  addEdge(from: string, to: string): GraphBuilder<S, C>;

  /**
   * Appends an edge whose target is chosen by `router` from the state `from` produced.
   */
  addConditionalEdge(from: string, router: GraphNodeRouter<S, C>): GraphBuilder<S, C>;

  /**
   * Sets the node where execution begins. Calling it again replaces the previous entry point.
   */
  setEntryPoint(name: string): GraphBuilder<S, C>;

  /**
   * Snapshots the definition into a runnable graph.
   * @throws GraphConfigurationError when no entry point is set, or, with `strict`, when references are dangling
   */
  compile(options?: Partial<GraphCompileOptions>): CompiledGraph<S, C>;
}
