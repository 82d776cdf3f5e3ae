import { runTaintEngine } from '../taint/index.ts';
import type { AnalysisBackend } from './index.ts';

export const builtinBackend: AnalysisBackend = {
  name: 'builtin',
  analyze: ({ files, library, options }) => runTaintEngine(files, library, options),
};
