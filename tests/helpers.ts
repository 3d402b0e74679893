import { analyzeDockerfile } from '../src/engine/analyzer';
import { DockerfileError } from '../src/parser/errors';
import { parseInstruction } from '../src/parser/parser';
import { FromInstruction } from '../src/parser/types';

export function analysisError(content: string): DockerfileError {
  try {
    analyzeDockerfile(content);
  } catch (err) {
    if (err instanceof DockerfileError) return err;
    throw err;
  }
  throw new Error('expected analysis to fail');
}

export function fromInstruction(text: string, line = 1): FromInstruction {
  const inst = parseInstruction(text, line);
  if (inst.type !== 'FROM') throw new Error(`expected FROM, got ${inst.type}`);
  return inst;
}

export const MULTISTAGE_DOCKERFILE = `
FROM registry.example.com/base-images/python@sha256:55f1d15e AS base

LABEL org.opencontainers.image.title="My App" \\
      org.opencontainers.image.version="1.0"

ENV PYTHONPATH=/src \\
    PATH="/home/appuser/.local/bin:\\$PATH"
WORKDIR /src
RUN pip install --no-cache-dir -r requirements.txt

FROM base AS test
COPY ./test ./test
RUN pytest

FROM base
ARG GIT_COMMIT
ENV GIT_COMMIT=$GIT_COMMIT
EXPOSE 5000
CMD ["uvicorn", "app.main:app"]
`;
