import type { BankFields, DepartmentFields, PersonFields } from './entities.js';
import type { FunctionTag, SourceId } from './enums.js';

// One source's partial, timestamped view of an entity. Never mutated.
interface ObservationBase {
  observationId?: string;
  source: SourceId;
  observedAt: string;
  confidence?: number;
  sourceUrl?: string;
  verified?: boolean;
}

export interface DepartmentObservation extends Partial<DepartmentFields> {
  name: string;
  functions?: FunctionTag[];
}

export interface LeaderObservation {
  name?: string;
  title?: string;
  department?: string;
  profileHandle?: string;
  email?: string;
}

export interface BankObservation extends ObservationBase {
  kind: 'bank';
  fields: Partial<BankFields> & {
    sourceUrls?: string[];
    tags?: string[];
  };
  departments: DepartmentObservation[];
  leadership: LeaderObservation[];
}

export interface PersonObservation extends ObservationBase {
  kind: 'person';
  fields: Partial<Omit<PersonFields, 'employer'>>;
  employer?: string;
  bankKey?: string;
}

export type Observation = BankObservation | PersonObservation;
