/**
 * Pipeline Observers
 *
 * Side-channel listeners for extraction lifecycle events. Notification is
 * fire-and-forget: an observer that throws or rejects is logged and
 * otherwise ignored, and payloads are frozen so observers cannot alter
 * what the pipeline does next.
 */

import {
  logCommitted,
  logExtractionFailure,
  logExtractionStart,
  logExtractionSuccess,
  logFallback,
  logProviderCall,
  logWarning
} from '@/utils/logger';
import type { ExtractionFailureKind } from './errors';

// ═══════════════════════════════════════════════════════════════════════════════
// Events
// ═══════════════════════════════════════════════════════════════════════════════

interface BaseEvent {
  entryId: string;
  /** ISO 8601 */
  timestamp: string;
}

export interface StartedEvent extends BaseEvent {
  type: 'started';
  provider: string;
}

export interface ProviderCalledEvent extends BaseEvent {
  type: 'provider_called';
  provider: string;
  /** 1-based, per segment */
  attempt: number;
  /** 0-based segment index */
  segment: number;
}

export interface FellBackEvent extends BaseEvent {
  type: 'fell_back';
  from: string;
  reason: ExtractionFailureKind;
  message: string;
}

export interface SucceededEvent extends BaseEvent {
  type: 'succeeded';
  provider: string;
  degraded: boolean;
  latencyMs: number;
  entities: number;
  relations: number;
}

/** `start` is the entry's `running` status write, before extraction */
export type FailureStage = 'start' | 'extraction' | 'commit';

export interface FailedEvent extends BaseEvent {
  type: 'failed';
  kind: string;
  message: string;
  stage: FailureStage;
}

export interface CommittedEvent extends BaseEvent {
  type: 'committed';
  entitiesCreated: number;
  entitiesMerged: number;
  relationsCreated: number;
  relationsMerged: number;
}

export type PipelineEvent =
  | StartedEvent
  | ProviderCalledEvent
  | FellBackEvent
  | SucceededEvent
  | FailedEvent
  | CommittedEvent;

export type PipelineEventType = PipelineEvent['type'];

/** Event payload as supplied by the emitter; the registry stamps the time. */
export type PipelineEventInput = PipelineEvent extends infer E
  ? E extends unknown
    ? Omit<E, 'timestamp'>
    : never
  : never;

export interface PipelineObserver {
  readonly name: string;
  onEvent(event: Readonly<PipelineEvent>): void | Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Registry
// ═══════════════════════════════════════════════════════════════════════════════

export class ObserverRegistry {
  private readonly observers: PipelineObserver[] = [];

  constructor(observers: PipelineObserver[] = []) {
    for (const observer of observers) this.register(observer);
  }

  register(observer: PipelineObserver): void {
    this.observers.push(observer);
  }

  get size(): number {
    return this.observers.length;
  }

  /**
   * Deliver an event to every observer. Never throws and never waits on
   * an observer's promise.
   */
  notify(input: PipelineEventInput): void {
    const event: Readonly<PipelineEvent> = Object.freeze({
      ...input,
      timestamp: new Date().toISOString()
    });

    for (const observer of this.observers) {
      try {
        const result = observer.onEvent(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            logWarning(`Observer ${observer.name} rejected on ${event.type}:`, error);
          });
        }
      } catch (error) {
        logWarning(`Observer ${observer.name} threw on ${event.type}:`, error);
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Logging Observer
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default observer: maps lifecycle events onto EXTRACT log lines.
 */
export class LoggingObserver implements PipelineObserver {
  readonly name = 'logging';

  onEvent(event: Readonly<PipelineEvent>): void {
    switch (event.type) {
      case 'started':
        logExtractionStart(event.entryId, event.provider);
        break;
      case 'provider_called':
        logProviderCall(event.provider, event.attempt, event.segment);
        break;
      case 'fell_back':
        logFallback(event.from, event.reason, event.message);
        break;
      case 'succeeded':
        logExtractionSuccess(
          { entities: event.entities, relations: event.relations },
          event.latencyMs,
          event.degraded
        );
        break;
      case 'failed':
        logExtractionFailure(event.kind, event.message, event.stage);
        break;
      case 'committed':
        logCommitted(event);
        break;
      default: {
        const _exhaustive: never = event;
        throw new Error(`Unknown event: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }
}
