/**
 * What a caller submits for auditing. Immutable once submitted.
 */
export type AuditTarget =
  | { kind: 'web'; url: string }
  | { kind: 'pdf'; bytes: Uint8Array; filename: string }
  | { kind: 'html'; html: string; filename: string };

export type AuditTargetKind = AuditTarget['kind'];

/**
 * Scoring baseline a target is calibrated against. HTML documents score as web.
 */
export type ScoringKind = 'web' | 'pdf';

/**
 * What a persisted run records about its target.
 *
 * Raw document bytes are not written into artifacts; uploaded documents are
 * identified by name, size and digest instead.
 */
export type TargetDescriptor =
  | { kind: 'web'; url: string }
  | { kind: 'pdf' | 'html'; filename: string; byteLength: number; sha256: string };
