import { loadConfig } from '../../lib/env-config.js';
import { createPipeline, type TutorPipeline } from '../../services/pipeline-factory.js';
import { output } from './output.js';

/**
 * Load configuration and build the pipeline, exiting with status 2 on bad configuration
 */
export function loadPipelineOrExit(): TutorPipeline {
  const config = loadConfig();
  if (config.isErr()) {
    output.error('Invalid configuration', config.error);
    process.exit(2);
  }
  return createPipeline(config.value);
}
