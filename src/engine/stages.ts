import { DockerfileError } from '../parser/errors';
import { parseImageReference } from '../parser/image';
import { FromInstruction, ImageReference } from '../parser/types';

export interface Stage {
  index: number;
  name?: string;
  baseImage: ImageReference;
  line: number;
}

export type SourceResolution =
  | { kind: 'stage'; stage: Stage }
  | { kind: 'image'; image: ImageReference };

function invalidReference(reason: string): DockerfileError {
  return new DockerfileError('InvalidStageReference', reason);
}

/**
 * Append-only stage registry. Lookups see only stages declared before the
 * current instruction; a reused name shadows the earlier stage.
 */
export class StageGraph {
  private readonly stages: Stage[] = [];
  private readonly byName = new Map<string, number>();

  /** @param documentNames every stage name in the document, for forward-reference checks */
  constructor(private readonly documentNames: ReadonlySet<string>) {}

  get all(): readonly Stage[] {
    return this.stages;
  }

  get current(): Stage | undefined {
    return this.stages[this.stages.length - 1];
  }

  declare(from: FromInstruction): Stage {
    const stage: Stage = {
      index: this.stages.length,
      name: from.alias,
      baseImage: this.resolveBase(from),
      line: from.line,
    };
    this.stages.push(stage);
    if (stage.name !== undefined) this.byName.set(stage.name, stage.index);
    return stage;
  }

  resolveSource(ref: string): SourceResolution {
    const current = this.current;

    if (/^\d+$/.test(ref)) {
      const idx = Number(ref);
      if (current === undefined || idx > current.index) {
        throw invalidReference(`stage ${idx} has not been declared`);
      }
      if (idx === current.index) {
        throw invalidReference(`stage ${idx} cannot copy from itself`);
      }
      return { kind: 'stage', stage: this.stages[idx] };
    }

    const name = ref.toLowerCase();
    const idx = this.byName.get(name);
    if (idx !== undefined) {
      if (current !== undefined && idx === current.index) {
        throw invalidReference(`stage '${name}' cannot copy from itself`);
      }
      return { kind: 'stage', stage: this.stages[idx] };
    }
    if (this.documentNames.has(name)) {
      throw invalidReference(`stage '${name}' is referenced before it is declared`);
    }
    return { kind: 'image', image: { full: ref, components: parseImageReference(ref) } };
  }

  private resolveBase(from: FromInstruction): ImageReference {
    const name = from.image.toLowerCase();
    if (this.byName.has(name)) {
      return { full: name };
    }
    if (name === from.alias) {
      throw invalidReference(`stage '${name}' cannot use itself as its base image`);
    }
    if (this.documentNames.has(name)) {
      throw invalidReference(`stage '${name}' is referenced before it is declared`);
    }
    return { full: from.image, components: parseImageReference(from.image) };
  }
}
