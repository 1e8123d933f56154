import { z, ZodError } from 'zod';
import {
  EntityKind,
  FunctionTag,
  SizeCategory,
  SourceId,
  TaskStatus,
  CollectionStatus,
  type Observation,
} from '@mrm/shared';
import { ValidationError } from './errors.js';

// Common validators
export const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);
export const isoTimestampSchema = z.string().datetime({ offset: true });

export const paginationSchema = z.object({
  limit: z.coerce.number().min(1).max(100).optional().default(20),
  cursor: z.string().optional(),
});

// Observation schemas
const observationBaseSchema = z.object({
  observationId: z.string().min(1).max(100).optional(),
  source: z.nativeEnum(SourceId),
  observedAt: isoTimestampSchema,
  confidence: z.number().min(0).max(1).optional(),
  sourceUrl: z.string().url().optional(),
  verified: z.boolean().optional(),
});

export const bankFieldsSchema = z.object({
  name: z.string().trim().min(1).max(500).optional(),
  certId: z.number().int().positive().optional(),
  rssdId: z.number().int().positive().optional(),
  assetRank: z.number().int().positive().optional(),
  totalAssets: z.number().nonnegative().optional(), // millions
  headquartersCity: z.string().trim().min(1).max(100).optional(),
  headquartersState: z.string().trim().min(1).max(100).optional(),
  website: z.string().url().optional(),
  notes: z.string().trim().min(1).max(5000).optional(),
  sourceUrls: z.array(z.string().url()).max(50).optional(),
  tags: z.array(z.string().trim().min(1).max(100)).max(20).optional(),
});

export const departmentObservationSchema = z.object({
  name: z.string().trim().min(1).max(300),
  parentOrg: z.string().trim().min(1).max(300).optional(),
  reportingStructure: z.string().trim().min(1).max(500).optional(),
  teamSize: z.number().int().nonnegative().optional(),
  functions: z.array(z.nativeEnum(FunctionTag)).max(20).optional(),
});

export const leaderObservationSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    title: z.string().trim().min(1).max(300).optional(),
    department: z.string().trim().min(1).max(300).optional(),
    profileHandle: z.string().trim().min(1).max(300).optional(),
    email: z.string().email().optional(),
  })
  .refine((leader) => leader.name !== undefined || leader.profileHandle !== undefined, {
    message: 'Leader needs a name or a profile handle',
  });

export const bankObservationSchema = observationBaseSchema
  .extend({
    kind: z.literal(EntityKind.BANK),
    fields: bankFieldsSchema,
    departments: z.array(departmentObservationSchema).max(50).default([]),
    leadership: z.array(leaderObservationSchema).max(100).default([]),
  })
  .refine((obs) => obs.fields.name !== undefined || obs.fields.certId !== undefined, {
    message: 'Bank observation needs a name or a registry certificate id',
    path: ['fields'],
  });

export const personObservationSchema = observationBaseSchema
  .extend({
    kind: z.literal(EntityKind.PERSON),
    fields: z.object({
      name: z.string().trim().min(1).max(200).optional(),
      title: z.string().trim().min(1).max(300).optional(),
      department: z.string().trim().min(1).max(300).optional(),
      profileHandle: z.string().trim().min(1).max(300).optional(),
      email: z.string().email().optional(),
    }),
    employer: z.string().trim().min(1).max(500).optional(),
    bankKey: z.string().min(1).max(600).optional(),
  })
  .refine(
    (obs) => obs.fields.name !== undefined || obs.fields.profileHandle !== undefined,
    {
      message: 'Person observation needs a name or a profile handle',
      path: ['fields'],
    }
  );

export const observationSchema = z.union([bankObservationSchema, personObservationSchema]);

export const observationBatchSchema = z.object({
  observations: z.array(z.unknown()).min(1).max(500),
});

/**
 * Validate a raw observation from a collector or the intake API.
 * Throws ValidationError with the zod issues attached.
 */
export function parseObservation(input: unknown): Observation {
  try {
    return observationSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError('Malformed observation', { issues: error.issues });
    }
    throw error;
  }
}

// Task schemas
export const taskTransitionSchema = z.object({
  status: z.nativeEnum(TaskStatus),
  assignedTo: z.string().trim().min(1).max(200).optional(),
  findings: z.string().max(10000).optional(),
});

export const researchScanSchema = z.object({
  kind: z.nativeEnum(EntityKind).optional().default(EntityKind.BANK),
});

export const researchQueueSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().default(10),
});

// Query parameter schemas
export const entityQuerySchema = paginationSchema.extend({
  query: z.string().max(200).optional(),
  kind: z.nativeEnum(EntityKind).optional(),
  state: z.string().trim().min(1).max(100).optional(),
  sizeCategory: z.nativeEnum(SizeCategory).optional(),
  hasMrmData: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  minCompleteness: z.coerce.number().min(0).max(1).optional(),
});
export type EntityQuery = z.infer<typeof entityQuerySchema>;

export const taskQuerySchema = paginationSchema.extend({
  status: z.nativeEnum(TaskStatus).optional(),
});

export const logQuerySchema = paginationSchema.extend({
  entityKey: z.string().max(600).optional(),
  status: z.nativeEnum(CollectionStatus).optional(),
});
