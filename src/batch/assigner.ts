/**
 * Batch Assigner
 *
 * Resolves one synthetic (timestamp, location) pair per provenance group
 * and one assignment per uploaded file, for the lifetime of one batch.
 *
 * State is owned by the instance: create one assigner per batch session
 * and drop it when the batch ends.
 *
 * Group cache population runs without a suspension point between the
 * lookup and the store, so concurrent files of one group always observe
 * the first file's pair.
 */

import { businessHours as configuredBusinessHours, env } from '../config/index.js';
import { computeGroupKey, type ProvenanceGroupKey } from '../grouping/provenance.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { FileIdentitySchema, ServiceLabelSchema } from '../lib/validation.js';
import { pickLocation, type LocationCatalog, type NamedLocation } from '../locations/catalog.js';
import { readCaptureMetadata, type MetadataRecord } from '../metadata/exif.js';
import type { CalendarDate, CaptureTimestamp } from '../timestamps/capture-timestamp.js';
import {
  uniformInRange,
  uniformWeekdayInRange,
  type BusinessHours,
  type RandomSource
} from '../timestamps/generator.js';

/**
 * Identity of an uploaded file within a batch
 */
export interface FileIdentity {
  name: string;
  size: number;
}

export type TimestampPolicy =
  | { kind: 'range'; start: CalendarDate; end: CalendarDate }
  | { kind: 'weekday'; start: CalendarDate; end: CalendarDate }
  | { kind: 'fixed'; timestamp: CaptureTimestamp };

/**
 * Pair shared by every file of one provenance group
 */
export interface SharedCapture {
  readonly timestamp: Readonly<CaptureTimestamp>;
  readonly location: Readonly<NamedLocation>;
}

export interface Assignment extends SharedCapture {
  /** Only field that may change after assignment */
  service: string;
  readonly groupKey: ProvenanceGroupKey | null;
}

export type MetadataLoader = (imageBuffer: Buffer) => Promise<MetadataRecord | null>;

export interface BatchAssignerOptions {
  catalog: LocationCatalog;
  timestampPolicy: TimestampPolicy;
  /** Defaults to the exiftool-backed reader */
  readMetadata?: MetadataLoader;
  random?: RandomSource;
  /** Defaults to BUSINESS_HOURS_START / BUSINESS_HOURS_END */
  businessHours?: BusinessHours;
  /** Defaults to WEEKDAY_MAX_ATTEMPTS */
  maxWeekdayAttempts?: number;
  logger?: Logger;
}

export function fileIdentityKey(file: FileIdentity): string {
  const { name, size } = FileIdentitySchema.parse(file);
  return `${name}:${size}`;
}

export class BatchAssigner {
  private readonly assignments = new Map<string, Assignment>();
  private readonly pending = new Map<string, Promise<Assignment>>();
  private readonly groups = new Map<ProvenanceGroupKey, SharedCapture>();
  /** Bumped by clear() so that calls started earlier skip the caches */
  private generation = 0;

  private readonly readMetadata: MetadataLoader;
  private readonly random: RandomSource;
  private readonly businessHours: BusinessHours;
  private readonly maxWeekdayAttempts: number;
  private readonly logger: Logger;

  constructor(private readonly options: BatchAssignerOptions) {
    if (options.catalog.length === 0) {
      throw new RangeError('BatchAssigner requires at least one location');
    }
    this.readMetadata = options.readMetadata ?? readCaptureMetadata;
    this.random = options.random ?? Math.random;
    this.businessHours = options.businessHours ?? configuredBusinessHours();
    this.maxWeekdayAttempts = options.maxWeekdayAttempts ?? env.WEEKDAY_MAX_ATTEMPTS;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Number of files assigned so far */
  get size(): number {
    return this.assignments.size;
  }

  /** Number of distinct provenance groups seen so far */
  get groupCount(): number {
    return this.groups.size;
  }

  /**
   * Assignment for a file, created on first call and reused afterwards
   */
  async assign(
    file: FileIdentity,
    originalBytes: Buffer,
    serviceDefault: string
  ): Promise<Assignment> {
    const id = fileIdentityKey(file);

    const existing = this.assignments.get(id);
    if (existing) {
      return existing;
    }

    const inFlight = this.pending.get(id);
    if (inFlight) {
      return inFlight;
    }

    const task: Promise<Assignment> = this.createAssignment(
      id,
      originalBytes,
      serviceDefault,
      this.generation
    ).finally(() => {
      if (this.pending.get(id) === task) {
        this.pending.delete(id);
      }
    });
    this.pending.set(id, task);
    return task;
  }

  get(file: FileIdentity): Assignment | undefined {
    return this.assignments.get(fileIdentityKey(file));
  }

  /**
   * Change the service label of one file; the group's pair is untouched
   */
  overrideService(file: FileIdentity, service: string): Assignment {
    const id = fileIdentityKey(file);
    const current = this.assignments.get(id);
    if (!current) {
      throw new Error(`No assignment for file ${id}`);
    }

    const updated: Assignment = { ...current, service: ServiceLabelSchema.parse(service) };
    this.assignments.set(id, updated);
    return updated;
  }

  /**
   * Forget every assignment. Calls still in flight resolve normally but
   * leave no trace in the caches.
   */
  clear(): void {
    this.generation++;
    this.pending.clear();
    this.assignments.clear();
    this.groups.clear();
  }

  private async createAssignment(
    id: string,
    originalBytes: Buffer,
    serviceDefault: string,
    generation: number
  ): Promise<Assignment> {
    const service = ServiceLabelSchema.parse(serviceDefault);
    const original = await this.readMetadata(originalBytes);

    const current = generation === this.generation;
    const groupKey = computeGroupKey(original);
    const capture = this.resolveCapture(groupKey, current);

    const assignment: Assignment = { ...capture, service, groupKey };
    if (current) {
      this.assignments.set(id, assignment);
    }

    this.logger.debug(
      { file: id, groupKey, location: capture.location.name, cached: current },
      'Assigned capture metadata'
    );
    return assignment;
  }

  private resolveCapture(groupKey: ProvenanceGroupKey | null, useCache: boolean): SharedCapture {
    const cacheKey = useCache ? groupKey : null;
    if (cacheKey !== null) {
      const cached = this.groups.get(cacheKey);
      if (cached) {
        return cached;
      }
    }

    const capture: SharedCapture = Object.freeze({
      timestamp: Object.freeze(this.generateTimestamp()),
      location: Object.freeze({ ...pickLocation(this.options.catalog, this.random) })
    });

    if (cacheKey !== null) {
      this.groups.set(cacheKey, capture);
    }
    return capture;
  }

  private generateTimestamp(): CaptureTimestamp {
    const policy = this.options.timestampPolicy;
    const generatorOptions = {
      random: this.random,
      businessHours: this.businessHours
    };

    switch (policy.kind) {
      case 'range':
        return uniformInRange(policy.start, policy.end, generatorOptions);
      case 'weekday':
        return uniformWeekdayInRange(policy.start, policy.end, {
          ...generatorOptions,
          maxAttempts: this.maxWeekdayAttempts
        });
      case 'fixed':
        return { ...policy.timestamp };
    }
  }
}
