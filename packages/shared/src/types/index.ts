/**
 * Core types for SensorLink
 */

// Sensing domains a bridge can advertise
export const SENSING_DOMAINS = [
  'acoustic',
  'optical',
  'radio_frequency',
  'millimeter_wave',
  'magnetic',
  'capacitive',
  'thermal',
  'vibration',
  'other',
] as const;

export type SensingDomain = (typeof SENSING_DOMAINS)[number];

// Transports, listed in selection preference order
export const TRANSPORTS = ['gige', 'usb3', 'udp', 'zmq', 'tcp', 'usb_hid'] as const;

export type Transport = (typeof TRANSPORTS)[number];

export const SAMPLE_FORMATS = ['uint8', 'int16', 'int32', 'float32', 'float64'] as const;

export type SampleFormat = (typeof SAMPLE_FORMATS)[number];

// Time sources, listed in selection preference order
export const SYNC_SOURCES = ['gps_pulse', 'ntp', 'peer_clock', 'local'] as const;

export type SyncSource = (typeof SYNC_SOURCES)[number];

export const CORRELATION_OPERATIONS = [
  'multiplication',
  'convolution',
  'cross_correlation',
  'coherence',
  'hilbert_envelope',
  'spectral_transform',
  'custom',
] as const;

export type CorrelationOperation = (typeof CORRELATION_OPERATIONS)[number];

export const EXECUTION_MODES = ['local', 'remote', 'privacy_preserving', 'adaptive'] as const;

export type ExecutionMode = (typeof EXECUTION_MODES)[number];

/** A mode the engine can actually run; `adaptive` always resolves to one of these */
export type ResolvedMode = Exclude<ExecutionMode, 'adaptive'>;

export const RESOURCE_TYPES = ['stream', 'snapshot', 'mixed', 'analysis'] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

// Stream session lifecycle
export const SESSION_STATES = {
  CLOSED: 'CLOSED',
  NEGOTIATING: 'NEGOTIATING',
  OPEN: 'OPEN',
  PAUSED: 'PAUSED',
  ERROR: 'ERROR',
} as const;

export type SessionState = (typeof SESSION_STATES)[keyof typeof SESSION_STATES];

export * from './capability.js';
export * from './pattern.js';
export * from './collaborators.js';
