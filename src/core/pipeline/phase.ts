/**
 * A named, ordered slot in a pipeline.
 *
 * Phases are identity tokens: two phases with the same name are still
 * different phases. A phase is created once by whoever needs the
 * insertion point and is never recreated.
 */
export class PipelinePhase {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
    Object.freeze(this);
  }

  toString(): string {
    return `Phase('${this.name}')`;
  }
}
