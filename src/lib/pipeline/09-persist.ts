import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from '@/lib/logger';
import { MissingRequiredInputError } from './errors';
import type { PipelineStage } from './types';
import { encodeMatrixNpy, encodeNpy } from './utils/npy';

export const OUTPUT_FILES = {
  features: 'x_data.npy',
  target: 'y_data.npy',
  featureNames: 'feature_names.json'
} as const;

export function createPersistStage(options: { outputDir: string; logger?: Logger }): PipelineStage {
  return {
    name: 'persist',
    process(context) {
      const { features, featureNames, target } = context;
      if (!features) throw new MissingRequiredInputError('persist', 'features');
      if (!featureNames) throw new MissingRequiredInputError('persist', 'featureNames');
      if (!target) throw new MissingRequiredInputError('persist', 'target');

      fs.mkdirSync(options.outputDir, { recursive: true });

      const xPath = path.join(options.outputDir, OUTPUT_FILES.features);
      const yPath = path.join(options.outputDir, OUTPUT_FILES.target);
      const namesPath = path.join(options.outputDir, OUTPUT_FILES.featureNames);

      fs.writeFileSync(xPath, encodeMatrixNpy(features, featureNames.length));
      fs.writeFileSync(yPath, encodeNpy(target, [target.length]));
      fs.writeFileSync(namesPath, `${JSON.stringify(featureNames, null, 2)}\n`);

      options.logger?.info({ stage: 'persist', xPath, yPath, namesPath }, 'saved feature matrix and target');
      return context;
    }
  };
}
