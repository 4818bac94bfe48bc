/**
 * Phase graph and interception registry.
 *
 * A Pipeline is an ordered list of phases, each owning an ordered list of
 * interceptors. Phases and interceptors are registered while plugins are
 * installed; once the owning application has started the pipeline is
 * frozen and only read, by any number of concurrent runs.
 */

import { PhaseNotFoundError, PipelineFrozenError } from '../pipeline-error.js';
import { PipelineContext } from './context.js';
import type { PipelinePhase } from './phase.js';
import type { ExecuteOptions, Interceptor, PhaseRelation } from './types.js';

// ---------------------------------------------------------------------------
// Phase content
// ---------------------------------------------------------------------------

interface PhaseContent<TSubject, TCall> {
  readonly phase: PipelinePhase;
  readonly relation: PhaseRelation;
  readonly interceptors: Interceptor<TSubject, TCall>[];
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class Pipeline<TSubject, TCall> {
  private readonly phases: PhaseContent<TSubject, TCall>[] = [];

  /** Per source pipeline: how many interceptors of each phase were merged in. */
  private readonly mergedCounts = new WeakMap<Pipeline<TSubject, TCall>, Map<PipelinePhase, number>>();

  private flattened: readonly Interceptor<TSubject, TCall>[] | null = null;
  private frozen = false;

  constructor(...phases: PipelinePhase[]) {
    for (const phase of phases) {
      this.addPhase(phase);
    }
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Phases in execution order. */
  get items(): PipelinePhase[] {
    return this.phases.map((content) => content.phase);
  }

  /** Whether no phase has an interceptor. */
  get isEmpty(): boolean {
    return this.interceptorCount === 0;
  }

  get interceptorCount(): number {
    return this.phases.reduce((total, content) => total + content.interceptors.length, 0);
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  indexOf(phase: PipelinePhase): number {
    return this.phases.findIndex((content) => content.phase === phase);
  }

  contains(phase: PipelinePhase): boolean {
    return this.indexOf(phase) !== -1;
  }

  /** Interceptors registered for a phase, in registration order. */
  interceptorsFor(phase: PipelinePhase): Interceptor<TSubject, TCall>[] {
    return [...this.findContent(phase).interceptors];
  }

  // -------------------------------------------------------------------------
  // Phase graph
  // -------------------------------------------------------------------------

  /** Append a phase. Adding a phase that is already present does nothing. */
  addPhase(phase: PipelinePhase): void {
    this.assertMutable('add a phase');
    if (this.contains(phase)) return;

    this.phases.push({ phase, relation: { type: 'last' }, interceptors: [] });
    this.flattened = null;
  }

  /**
   * Insert `phase` directly before `reference`.
   *
   * @throws PhaseNotFoundError if `reference` is not in this pipeline.
   */
  insertPhaseBefore(reference: PipelinePhase, phase: PipelinePhase): void {
    this.assertMutable('insert a phase');
    const index = this.requireIndex(reference);
    if (this.contains(phase)) return;

    this.phases.splice(index, 0, { phase, relation: { type: 'before', reference }, interceptors: [] });
    this.flattened = null;
  }

  /**
   * Insert `phase` directly after `reference`.
   *
   * @throws PhaseNotFoundError if `reference` is not in this pipeline.
   */
  insertPhaseAfter(reference: PipelinePhase, phase: PipelinePhase): void {
    this.assertMutable('insert a phase');
    const index = this.requireIndex(reference);
    if (this.contains(phase)) return;

    this.phases.splice(index + 1, 0, { phase, relation: { type: 'after', reference }, interceptors: [] });
    this.flattened = null;
  }

  // -------------------------------------------------------------------------
  // Interception registry
  // -------------------------------------------------------------------------

  /**
   * Register an interceptor at `phase`. Interceptors of one phase run in
   * registration order; there is no way to remove one.
   *
   * @throws PhaseNotFoundError if `phase` is not in this pipeline.
   */
  intercept(phase: PipelinePhase, interceptor: Interceptor<TSubject, TCall>): void {
    this.assertMutable('register an interceptor');
    this.findContent(phase).interceptors.push(interceptor);
    this.flattened = null;
  }

  /**
   * Merge another pipeline's phases and interceptors into this one.
   *
   * Missing phases are placed by the relation they were inserted with in
   * `from` when its reference exists here, otherwise next to their
   * neighbour in `from`. Interceptors are appended after the ones already
   * registered. Merging the same pipeline again only brings in what was
   * added to it since.
   */
  merge(from: Pipeline<TSubject, TCall>): void {
    this.assertMutable('merge pipelines');
    if (from === this) return;

    let counts = this.mergedCounts.get(from);
    if (!counts) {
      counts = new Map();
      this.mergedCounts.set(from, counts);
    }

    const source = from.phases;
    for (let i = 0; i < source.length; i++) {
      const content = source[i];
      if (!this.contains(content.phase)) {
        this.placeMergedPhase(source, i);
      }

      const alreadyMerged = counts.get(content.phase) ?? 0;
      const fresh = content.interceptors.slice(alreadyMerged);
      if (fresh.length > 0) {
        this.findContent(content.phase).interceptors.push(...fresh);
      }
      counts.set(content.phase, content.interceptors.length);
    }

    this.flattened = null;
  }

  /** Reject every further registration. Idempotent. */
  freeze(): void {
    this.frozen = true;
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  /** Create a run over the current interceptors without starting it. */
  createContext(call: TCall, subject: TSubject, options?: ExecuteOptions): PipelineContext<TSubject, TCall> {
    return new PipelineContext(call, subject, this.flatten(), options);
  }

  /** Run every interceptor for `call` and resolve with the final subject. */
  execute(call: TCall, subject: TSubject, options?: ExecuteOptions): Promise<TSubject> {
    return this.createContext(call, subject, options).execute();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private flatten(): readonly Interceptor<TSubject, TCall>[] {
    if (this.flattened === null) {
      this.flattened = this.phases.flatMap((content) => content.interceptors);
    }
    return this.flattened;
  }

  private findContent(phase: PipelinePhase): PhaseContent<TSubject, TCall> {
    const content = this.phases.find((candidate) => candidate.phase === phase);
    if (!content) {
      throw new PhaseNotFoundError(phase);
    }
    return content;
  }

  private requireIndex(phase: PipelinePhase): number {
    const index = this.indexOf(phase);
    if (index === -1) {
      throw new PhaseNotFoundError(phase);
    }
    return index;
  }

  private placeMergedPhase(source: readonly PhaseContent<TSubject, TCall>[], position: number): void {
    const { phase, relation } = source[position];

    if (relation.type === 'before' && this.contains(relation.reference)) {
      this.insertPhaseBefore(relation.reference, phase);
      return;
    }
    if (relation.type === 'after' && this.contains(relation.reference)) {
      this.insertPhaseAfter(relation.reference, phase);
      return;
    }

    // Earlier phases of `from` are already present here.
    if (position > 0) {
      this.insertPhaseAfter(source[position - 1].phase, phase);
      return;
    }

    const next = source.slice(1).find((content) => this.contains(content.phase));
    if (next) {
      this.insertPhaseBefore(next.phase, phase);
    } else {
      this.addPhase(phase);
    }
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      throw new PipelineFrozenError(operation);
    }
  }
}
