import type { ReconstructionConfig } from './types.js';

export const DEFAULT_RECONSTRUCTION_CONFIG: ReconstructionConfig = {
	verbose: false,
	logger: console,
};

export function resolveConfig(config: Partial<ReconstructionConfig> = {}): ReconstructionConfig {
	return { ...DEFAULT_RECONSTRUCTION_CONFIG, ...config };
}
