export type InstructionType =
  | 'FROM' | 'RUN' | 'CMD' | 'LABEL' | 'EXPOSE' | 'ENV' | 'ADD' | 'COPY'
  | 'ENTRYPOINT' | 'VOLUME' | 'USER' | 'WORKDIR' | 'ARG' | 'ONBUILD'
  | 'STOPSIGNAL' | 'HEALTHCHECK' | 'SHELL' | 'MAINTAINER' | 'UNKNOWN';

export interface LogicalLine {
  /** 1-based line number of the first physical line */
  line: number;
  /** Joined instruction text with continuations and comments removed */
  value: string;
  /** Physical lines as they appeared, joined with newlines */
  raw: string;
  heredocs: string[];
}

interface BaseInstruction {
  /** Upper-cased keyword as written, also for unknown instructions */
  keyword: string;
  line: number;
  arguments: string;
  raw: string;
}

export interface FromInstruction extends BaseInstruction {
  type: 'FROM';
  flags: Record<string, string>;
  image: string;
  /** Lower-cased stage name from `AS <name>` */
  alias?: string;
  platform?: string;
}

export interface CopyInstruction extends BaseInstruction {
  type: 'COPY' | 'ADD';
  flags: Record<string, string>;
  from?: string;
}

export interface OnbuildInstruction extends BaseInstruction {
  type: 'ONBUILD';
  trigger: Instruction;
}

export interface PlainInstruction extends BaseInstruction {
  type: Exclude<InstructionType, 'FROM' | 'COPY' | 'ADD' | 'ONBUILD'>;
}

export type Instruction = FromInstruction | CopyInstruction | OnbuildInstruction | PlainInstruction;

export interface ImageComponents {
  registry?: string;
  name: string;
  tag?: string;
  digest?: string;
}

/**
 * A base image or `--from` source. `components` is absent when `full`
 * names a stage declared earlier in the same document.
 */
export interface ImageReference {
  full: string;
  components?: ImageComponents;
}
