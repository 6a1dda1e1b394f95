// src/utils/errors.ts
import type { ZodIssue } from 'zod';

/**
 * Type for structured error context that's more specific than 'any'
 */
export type ErrorContext = Record<string, unknown>;

/**
 * Base class for task graph errors, allowing for additional context
 * and tracking of the original error if applicable.
 */
export class AppError extends Error {
  /** Optional additional context related to the error. */
  public readonly context?: ErrorContext;
  /** Optional original error that caused this AppError. */
  public readonly originalError?: Error;

  /**
   * @param message The error message.
   * @param context Optional additional context.
   * @param originalError Optional original error.
   */
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.originalError = originalError;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised when a node id is already present in the graph.
 */
export class DuplicateNodeError extends AppError {
  public readonly nodeId: string;

  constructor(nodeId: string, context?: ErrorContext) {
    super(`Node ${nodeId} already exists in graph`, { ...(context || {}), nodeId });
    this.name = 'DuplicateNodeError';
    this.nodeId = nodeId;
  }
}

/**
 * Raised when an operation references a node or edge that does not exist.
 */
export class NotFoundError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised when an edge would connect a node to itself.
 */
export class SelfLoopError extends AppError {
  public readonly nodeId: string;

  constructor(nodeId: string, context?: ErrorContext) {
    super(`Self-loop on node ${nodeId} is not allowed`, { ...(context || {}), nodeId });
    this.name = 'SelfLoopError';
    this.nodeId = nodeId;
  }
}

/**
 * Raised when inserting an edge would close a cycle. The graph is left
 * exactly as it was before the insertion attempt.
 */
export class CycleError extends AppError {
  public readonly sourceId: string;
  public readonly targetId: string;

  constructor(sourceId: string, targetId: string, context?: ErrorContext) {
    super(`Adding edge ${sourceId} -> ${targetId} creates cycle`, { ...(context || {}), sourceId, targetId });
    this.name = 'CycleError';
    this.sourceId = sourceId;
    this.targetId = targetId;
  }
}

/**
 * Represents a structural inconsistency or rejected input.
 * Can include the specific zod issues when the input came through a schema.
 */
export class ValidationError extends AppError {
  /** Array of validation issues (using Zod's own type). */
  public readonly validationIssues?: ZodIssue[];

  /**
   * @param message The error message.
   * @param validationIssues Optional array of Zod validation issues.
   * @param context Optional additional context.
   */
  constructor(message: string, validationIssues?: ZodIssue[], context?: ErrorContext) {
    const errorContext = { ...(context || {}), validationIssues };
    super(message, errorContext);
    this.name = 'ValidationError';
    this.validationIssues = validationIssues;
  }
}

/**
 * Represents an error related to configuration issues,
 * such as environment variables that fail validation.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Represents an error related to parsing input documents, such as a graph
 * snapshot or task list file that is not valid JSON.
 */
export class ParsingError extends AppError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, context, originalError);
    this.name = 'ParsingError';
  }
}
