import { parse } from '../parser/parser';
import { DockerfileError, malformed } from '../parser/errors';
import { parseArgPairs, parseKeyValuePairs } from '../parser/key-value';
import { ImageReference, Instruction } from '../parser/types';
import { StageGraph } from './stages';
import { Analysis, MultistageAnalysis } from './types';

interface AnalysisState {
  graph: StageGraph;
  byType: Map<string, number>;
  images: Map<string, ImageReference>;
  stageNames: string[];
  copyFrom: Set<string>;
  addFrom: Set<string>;
  usedAsBase: Set<string>;
  copiedFrom: Set<string>;
  addedFrom: Set<string>;
  exposedPorts: string[];
  args: Map<string, string | undefined>;
  labels: Map<string, string>;
  envVars: Map<string, string>;
}

function visit(state: AnalysisState, inst: Instruction): void {
  switch (inst.type) {
    case 'FROM': {
      const stage = state.graph.declare(inst);
      const base = stage.baseImage;
      if (!state.images.has(base.full)) state.images.set(base.full, base);
      if (!base.components) state.usedAsBase.add(base.full);
      if (stage.name !== undefined) state.stageNames.push(stage.name);
      break;
    }
    case 'COPY':
    case 'ADD': {
      if (inst.from === undefined) break;
      const source = state.graph.resolveSource(inst.from);
      // Copying from an external image is not a stage relationship
      if (source.kind === 'image') break;
      const { stage } = source;
      const isCopy = inst.type === 'COPY';
      (isCopy ? state.copyFrom : state.addFrom).add(stage.name ?? String(stage.index));
      if (stage.name !== undefined) (isCopy ? state.copiedFrom : state.addedFrom).add(stage.name);
      break;
    }
    case 'EXPOSE': {
      const ports = inst.arguments.split(/\s+/).filter(Boolean);
      if (ports.length === 0) throw malformed('missing port');
      state.exposedPorts.push(...ports);
      break;
    }
    case 'ARG':
      for (const { name, defaultValue } of parseArgPairs(inst.arguments)) state.args.set(name, defaultValue);
      break;
    case 'ENV':
      for (const { key, value } of parseKeyValuePairs(inst.arguments)) state.envVars.set(key, value);
      break;
    case 'LABEL':
      for (const { key, value } of parseKeyValuePairs(inst.arguments)) state.labels.set(key, value);
      break;
    case 'RUN':
    case 'CMD':
    case 'ENTRYPOINT':
    case 'VOLUME':
    case 'USER':
    case 'WORKDIR':
    case 'ONBUILD':
    case 'STOPSIGNAL':
    case 'HEALTHCHECK':
    case 'SHELL':
    case 'MAINTAINER':
    case 'UNKNOWN':
      break;
    default: {
      const unhandled: never = inst;
      throw new Error(`Unhandled instruction: ${JSON.stringify(unhandled)}`);
    }
  }
}

function analyzeMultistage(state: AnalysisState): MultistageAnalysis {
  const finalName = state.graph.current?.name;
  const used = new Set([...state.usedAsBase, ...state.copiedFrom, ...state.addedFrom]);
  const unusedStages = [...new Set(state.stageNames)].filter(name => !used.has(name) && name !== finalName);

  return {
    isMultistage: state.graph.all.length > 1,
    stagesUsedAsBaseImages: [...state.usedAsBase],
    stagesCopiedFrom: [...state.copiedFrom],
    stagesAddedFrom: [...state.addedFrom],
    unusedStages,
  };
}

/**
 * Parse a Dockerfile and derive its stage topology, base images, instruction
 * counts and declared configuration in a single pass.
 *
 * @throws DockerfileError for the first instruction that cannot be analyzed
 */
export function analyzeDockerfile(content: string): Analysis {
  const instructions = parse(content);
  const documentNames = new Set<string>();
  for (const inst of instructions) {
    if (inst.type === 'FROM' && inst.alias !== undefined) documentNames.add(inst.alias);
  }

  const state: AnalysisState = {
    graph: new StageGraph(documentNames),
    byType: new Map(),
    images: new Map(),
    stageNames: [],
    copyFrom: new Set(),
    addFrom: new Set(),
    usedAsBase: new Set(),
    copiedFrom: new Set(),
    addedFrom: new Set(),
    exposedPorts: [],
    args: new Map(),
    labels: new Map(),
    envVars: new Map(),
  };

  for (const inst of instructions) {
    state.byType.set(inst.keyword, (state.byType.get(inst.keyword) ?? 0) + 1);
    try {
      visit(state, inst);
    } catch (err) {
      if (err instanceof DockerfileError) throw err.locate(inst.line, inst.keyword);
      throw err;
    }
  }

  return {
    numStages: state.graph.all.length,
    images: [...state.images.values()],
    stageNames: state.stageNames,
    copyFromStages: [...state.copyFrom],
    addFromStages: [...state.addFrom],
    multistageAnalysis: analyzeMultistage(state),
    exposedPorts: state.exposedPorts,
    instructions: { totalCount: instructions.length, byType: state.byType },
    args: state.args,
    labels: state.labels,
    envVars: state.envVars,
  };
}
