/**
 * @file errors.ts
 * @description Error taxonomy for reification, evaluation and baking.
 *
 * @pitfalls
 * - `UnhandledOperationError` signals a reifier/evaluator mismatch, not bad
 *   user data. Report it as a defect.
 */

export type ShadingErrorCode =
  | 'cycle'
  | 'unsupported_node'
  | 'unsupported_socket'
  | 'missing_attribute'
  | 'unhandled_operation'
  | 'invalid_element_data'
  | 'no_bake_output'
  | 'material_bake';

export abstract class ShadingError extends Error {
  abstract readonly code: ShadingErrorCode;
}

export class CycleError extends ShadingError {
  readonly code = 'cycle';

  constructor(public readonly graphName: string, public readonly nodeId: string) {
    super(`Loop detected in node graph '${graphName}' at node '${nodeId}'`);
    this.name = 'CycleError';
  }
}

export class UnsupportedNodeError extends ShadingError {
  readonly code = 'unsupported_node';
  /** Bake socket being reified when this was raised, filled in by the bake layer. */
  bakingSocket?: string;

  constructor(
    public readonly nodeKind: string,
    public readonly nodeId: string,
    public readonly detail?: string,
  ) {
    super(detail
      ? `Can't bake node '${nodeId}' of kind '${nodeKind}': ${detail}`
      : `Can't bake node '${nodeId}' of kind '${nodeKind}'`);
    this.name = 'UnsupportedNodeError';
  }
}

export class UnsupportedSocketError extends ShadingError {
  readonly code = 'unsupported_socket';
  bakingSocket?: string;

  constructor(
    public readonly nodeKind: string,
    public readonly nodeId: string,
    public readonly socketId: string,
  ) {
    super(`Can't bake socket '${socketId}' of node '${nodeId}' (${nodeKind})`);
    this.name = 'UnsupportedSocketError';
  }
}

export class MissingAttributeError extends ShadingError {
  readonly code = 'missing_attribute';

  constructor(public readonly attributeName: string) {
    super(`Element data does not have required attribute '${attributeName}'`);
    this.name = 'MissingAttributeError';
  }
}

export class UnhandledOperationError extends ShadingError {
  readonly code = 'unhandled_operation';

  constructor(public readonly family: string, public readonly operation: string) {
    super(`Internal Error: unhandled ${family} operation '${operation}'`);
    this.name = 'UnhandledOperationError';
  }
}

export class InvalidElementDataError extends ShadingError {
  readonly code = 'invalid_element_data';

  constructor(message: string) {
    super(`Element Data Error: ${message}`);
    this.name = 'InvalidElementDataError';
  }
}

export class NoBakeOutputError extends ShadingError {
  readonly code = 'no_bake_output';

  constructor(public readonly graphName: string) {
    super(`Could not find a bake output node in graph '${graphName}'`);
    this.name = 'NoBakeOutputError';
  }
}

export class MaterialBakeError extends ShadingError {
  readonly code = 'material_bake';

  constructor(public readonly materialName: string, public readonly inner: ShadingError) {
    super(`Failed to bake for material '${materialName}': ${inner.message}`, { cause: inner });
    this.name = 'MaterialBakeError';
  }
}
