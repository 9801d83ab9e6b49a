/**
 * Zod schemas for records that cross a trust or storage boundary
 */

import { z } from 'zod';
import {
  CORRELATION_OPERATIONS,
  SAMPLE_FORMATS,
  SENSING_DOMAINS,
  TRANSPORTS,
  type CapabilityEventBody,
  type CapabilityRegistration,
  type DiscoveryQuery,
  type PatternCandidate,
  type PatternEvidence,
  type PatternProvenance,
  type PatternState,
  type StreamDescriptor,
} from '../types/index.js';

export const sensingDomainSchema = z.enum(SENSING_DOMAINS);
export const transportSchema = z.enum(TRANSPORTS);
export const sampleFormatSchema = z.enum(SAMPLE_FORMATS);
export const correlationOperationSchema = z.enum(CORRELATION_OPERATIONS);

export const geoLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const capabilityRegistrationSchema: z.ZodType<CapabilityRegistration> = z
  .object({
    bridgeId: z.string().min(1),
    owner: z.string().min(1),
    domain: sensingDomainSchema,
    freqMin: z.number().min(0),
    freqMax: z.number().min(0),
    maxSampleRate: z.number().positive('maxSampleRate must be greater than 0'),
    bitDepth: z.number().int().min(1).max(64),
    channels: z.number().int().min(1).max(255),
    transports: z.array(transportSchema).min(1),
    mixingOps: z.array(correlationOperationSchema),
    location: geoLocationSchema.optional(),
    costPerKs: z.number().min(0),
    hostId: z.string().min(1).optional(),
  })
  .refine((c) => c.freqMin <= c.freqMax, {
    message: 'freqMin must not exceed freqMax',
    path: ['freqMin'],
  });

export const streamDescriptorSchema: z.ZodType<StreamDescriptor> = z.object({
  streamType: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'streamType must be URI-safe'),
  sampleRate: z.number().positive().max(1_000_000),
  format: sampleFormatSchema,
  bufferSize: z.number().int().positive(),
});

export const capabilityEventBodySchema: z.ZodType<CapabilityEventBody> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('registered'), at: z.number(), capability: capabilityRegistrationSchema }),
  z.object({ type: z.literal('heartbeat'), at: z.number() }),
  z.object({
    type: z.literal('rated'),
    at: z.number(),
    raterId: z.string().min(1),
    score: z.number().int().min(0).max(100),
  }),
  z.object({ type: z.literal('stream_registered'), at: z.number(), descriptor: streamDescriptorSchema }),
  z.object({ type: z.literal('unregistered'), at: z.number() }),
]);

export const discoveryQuerySchema: z.ZodType<DiscoveryQuery> = z.object({
  domains: z.array(sensingDomainSchema).optional(),
  freqMin: z.number().min(0).optional(),
  freqMax: z.number().min(0).optional(),
  minSampleRate: z.number().min(0).optional(),
  minReputation: z.number().min(0).max(1000).optional(),
  maxCost: z.number().min(0).optional(),
  transports: z.array(transportSchema).optional(),
  geo: z
    .object({
      center: geoLocationSchema,
      radiusKm: z.number().positive(),
    })
    .optional(),
  limit: z.number().int().positive().optional(),
});

// Agent ids key plain objects, where '__proto__' cannot be an own key
const agentIdSchema = z
  .string()
  .min(1)
  .refine((id) => id !== '__proto__', { message: "'__proto__' is not a valid agent id" });

export const patternProvenanceSchema: z.ZodType<PatternProvenance> = z.object({
  name: z.string().min(1),
  criteria: z.array(z.object({ name: z.string().min(1), description: z.string() })),
  examples: z.array(
    z.object({
      description: z.string(),
      signalA: z.string(),
      signalB: z.string(),
      expectedResult: z.string(),
    })
  ),
  citations: z.array(z.string().min(1)),
});

export const patternStateSchema: z.ZodType<PatternState> = z.object({
  id: z.string().min(1),
  domains: z.tuple([sensingDomainSchema, sensingDomainSchema]),
  operation: correlationOperationSchema,
  lagMs: z.number(),
  mechanism: z.string(),
  originAgent: z.string().min(1),
  discoveredAt: z.number(),
  contributions: z.record(agentIdSchema, z.number().min(0).max(1)),
  falsePositiveReporters: z.array(z.string()),
  provenance: patternProvenanceSchema.optional(),
});

export const patternCandidateSchema: z.ZodType<PatternCandidate> = z.object({
  domains: z.tuple([sensingDomainSchema, sensingDomainSchema]),
  operation: correlationOperationSchema,
  lagMs: z.number().finite(),
  mechanism: z.string(),
});

export const patternEvidenceSchema: z.ZodType<PatternEvidence> = z.object({
  agentId: agentIdSchema,
  confidence: z.number().min(0).max(1),
  requestId: z.string().optional(),
  peakMagnitude: z.number().min(0).max(1).optional(),
});
