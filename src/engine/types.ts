import { ImageReference } from '../parser/types';

export interface MultistageAnalysis {
  isMultistage: boolean;
  stagesUsedAsBaseImages: string[];
  stagesCopiedFrom: string[];
  stagesAddedFrom: string[];
  /** Declared names nothing refers to; the final stage is never listed */
  unusedStages: string[];
}

export interface InstructionStats {
  totalCount: number;
  byType: Map<string, number>;
}

/**
 * Structural facts about one Dockerfile. Every map keeps first-seen key
 * order; a redeclared key keeps its position and takes the later value.
 */
export interface Analysis {
  numStages: number;
  images: ImageReference[];
  stageNames: string[];
  copyFromStages: string[];
  addFromStages: string[];
  multistageAnalysis: MultistageAnalysis;
  exposedPorts: string[];
  instructions: InstructionStats;
  args: Map<string, string | undefined>;
  labels: Map<string, string>;
  envVars: Map<string, string>;
}
