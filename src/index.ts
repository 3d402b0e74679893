export { analyzeDockerfile } from './engine/analyzer';
export { StageGraph } from './engine/stages';
export type { Stage, SourceResolution } from './engine/stages';
export { toDict, fromDict, analysisDictSchema } from './engine/serialize';
export type { AnalysisDict } from './engine/serialize';
export type { Analysis, InstructionStats, MultistageAnalysis } from './engine/types';
export { DockerfileError } from './parser/errors';
export type { DockerfileErrorKind } from './parser/errors';
export { parseImageReference } from './parser/image';
export { parseArgPairs, parseKeyValuePairs } from './parser/key-value';
export { tokenize } from './parser/lexer';
export { parse, parseInstruction } from './parser/parser';
export type {
  ImageComponents, ImageReference, Instruction, InstructionType, LogicalLine,
} from './parser/types';
