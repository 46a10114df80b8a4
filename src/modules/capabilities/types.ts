export type CapabilityKind = 'extraction' | 'diagnosis-lookup' | 'medication-lookup' | 'validation';

export interface CapabilityMetadata {
  readonly timestamp: string;
  readonly [key: string]: unknown;
}

export interface CapabilitySuccess<T> {
  readonly success: true;
  readonly payload: T;
  readonly error: null;
  readonly metadata: CapabilityMetadata;
}

export interface CapabilityFailure {
  readonly success: false;
  readonly payload: null;
  readonly error: string;
  readonly metadata: CapabilityMetadata;
}

export type CapabilityResult<T> = CapabilitySuccess<T> | CapabilityFailure;

/**
 * A unit of work the orchestrator can call. Expected failures come back as
 * failed results; `execute` does not reject for them.
 */
export interface Capability<I, O> {
  readonly kind: CapabilityKind;
  readonly name: string;
  readonly description: string;
  execute(input: I): Promise<CapabilityResult<O>>;
}

export interface BatchCapability<I, O> extends Capability<I, O> {
  /** One result per input, in input order. */
  executeBatch(items: readonly I[]): Promise<CapabilityResult<O>[]>;
}

export interface Closeable {
  close(): Promise<void>;
}
