import { safe } from 'ts-safe';

/**
 * Error codes with associated default messages for the graph system
 */
export enum GraphErrorCode {
  // Graph Configuration Errors
  ENTRY_POINT_NOT_SET = 'Entry point not set',
  NODE_NOT_FOUND = 'Node not found in the graph',
  INVALID_EDGE = 'Invalid edge configuration',

  // Runtime Errors
  NO_OUTGOING_EDGE = 'No outgoing edge found for node',
  NODE_EXECUTION_FAILED = 'Node execution failed',
  ROUTING_FAILED = 'Conditional edge routing failed',
  MAX_NODE_VISITS_EXCEEDED = 'Maximum node visits exceeded',
}

type GraphErrorOptions = {
  message?: string;
  nodeName?: string;
  cause?: Error;
  context?: Record<string, unknown>;
};

/**
 * Base class for all graph-related errors
 */
export class GraphError extends Error {
  readonly code: GraphErrorCode;
  readonly nodeName?: string;
  readonly context?: Record<string, unknown>;

  constructor(code: GraphErrorCode, options?: GraphErrorOptions) {
    super(options?.message || code, options?.cause ? { cause: options.cause } : undefined);

    this.code = code;
    this.nodeName = options?.nodeName;
    this.context = options?.context;
    this.name = 'GraphError';
  }

  /**
   * Creates a string representation of the error with detailed information
   */
  toString(): string {
    let result = `[${this.name}] ${this.message}`;

    if (this.nodeName) {
      result += `\nNode: ${this.nodeName}`;
    }

    if (this.context && Object.keys(this.context).length > 0) {
      result += `\nContext: ${JSON.stringify(this.context, null, 2)}`;
    }

    if (this.cause) {
      result += `\nCaused by: ${this.cause}`;
    }

    return result;
  }

  /**
   * Formats the error with node name if available
   */
  formatWithNode(nodeName?: string): string {
    const name = nodeName || this.nodeName;
    if (!name) return this.message;
    return `${this.message} (Node: ${name})`;
  }
}

/**
 * Error thrown while compiling a graph
 */
export class GraphConfigurationError extends GraphError {
  constructor(code: GraphErrorCode, options?: GraphErrorOptions) {
    super(code, options);
    this.name = 'GraphConfigurationError';
  }

  static entryPointNotSet(): GraphConfigurationError {
    return new GraphConfigurationError(GraphErrorCode.ENTRY_POINT_NOT_SET);
  }

  /**
   * Creates a node not found error
   */
  static nodeNotFound(nodeName: string): GraphConfigurationError {
    return new GraphConfigurationError(GraphErrorCode.NODE_NOT_FOUND, {
      message: `Node "${nodeName}" not found in the graph`,
      nodeName,
    });
  }

  /**
   * Creates an error for a static edge pointing at a node that was never registered
   */
  static danglingEdge(nodeName: string, target: string): GraphConfigurationError {
    return new GraphConfigurationError(GraphErrorCode.INVALID_EDGE, {
      message: `Node "${nodeName}" has an edge to non-existent node "${target}"`,
      nodeName,
      context: { target },
    });
  }
}

/**
 * Error thrown during graph execution
 */
export class GraphExecutionError extends GraphError {
  constructor(code: GraphErrorCode, options?: GraphErrorOptions) {
    super(code, options);
    this.name = 'GraphExecutionError';
  }

  static nodeNotFound(nodeName: string): GraphExecutionError {
    return new GraphExecutionError(GraphErrorCode.NODE_NOT_FOUND, {
      message: `Node "${nodeName}" not found in the graph`,
      nodeName,
    });
  }

  static noOutgoingEdge(nodeName: string): GraphExecutionError {
    return new GraphExecutionError(GraphErrorCode.NO_OUTGOING_EDGE, {
      message: `Node "${nodeName}" has no outgoing edge`,
      nodeName,
    });
  }

  /**
   * Creates an error for node execution failure
   */
  static nodeExecutionFailed(nodeName: string, error: Error): GraphExecutionError {
    return new GraphExecutionError(GraphErrorCode.NODE_EXECUTION_FAILED, {
      message: `Execution of node "${nodeName}" failed: ${error.message}`,
      nodeName,
      cause: error,
    });
  }

  static routingFailed(nodeName: string, error: Error): GraphExecutionError {
    return new GraphExecutionError(GraphErrorCode.ROUTING_FAILED, {
      message: `Routing from node "${nodeName}" failed: ${error.message}`,
      nodeName,
      cause: error,
    });
  }

  /**
   * Creates an error for a router that returned something other than a node name
   */
  static invalidRouterResult(nodeName: string, result: unknown): GraphExecutionError {
    return new GraphExecutionError(GraphErrorCode.ROUTING_FAILED, {
      message: `Router of node "${nodeName}" returned ${typeof result} instead of a node name`,
      nodeName,
      context: { result },
    });
  }

  /**
   * Creates an error for maximum node visits exceeded
   */
  static maxVisitsExceeded(nodeName: string, maxVisits: number): GraphExecutionError {
    return new GraphExecutionError(GraphErrorCode.MAX_NODE_VISITS_EXCEEDED, {
      message: `Maximum node visits (${maxVisits}) exceeded at node "${nodeName}"`,
      nodeName,
      context: { maxVisits },
    });
  }
}

/**
 * Narrows an unknown value to a GraphError, optionally of a given code
 */
export const isGraphError = (error: unknown, code?: GraphErrorCode): error is GraphError => {
  if (!(error instanceof GraphError)) return false;
  return code === undefined || error.code === code;
};

/**
 * Normalizes a thrown value into an Error
 */
export const toError = (error: unknown): Error => {
  if (error instanceof Error) return error;
  return new Error(
    safe(() => String(error))
      .catch(() => 'Unknown error')
      .unwrap()
  );
};
