import type { CapabilityFailure, CapabilityMetadata, CapabilitySuccess } from './types';

function buildMetadata(extra: Record<string, unknown>): CapabilityMetadata {
  const metadata: CapabilityMetadata = { ...extra, timestamp: new Date().toISOString() };
  return Object.freeze(metadata);
}

export function succeed<T>(payload: T, metadata: Record<string, unknown> = {}): CapabilitySuccess<T> {
  const result: CapabilitySuccess<T> = {
    success: true,
    payload,
    error: null,
    metadata: buildMetadata(metadata),
  };
  return Object.freeze(result);
}

export function fail(error: string, metadata: Record<string, unknown> = {}): CapabilityFailure {
  const result: CapabilityFailure = {
    success: false,
    payload: null,
    error,
    metadata: buildMetadata(metadata),
  };
  return Object.freeze(result);
}
