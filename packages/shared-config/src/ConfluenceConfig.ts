import { envInt, envNumber } from './env';

export interface ConfluenceConfig {
  tolerancePct: number; // percent of the previous level
  minSignals: number; // distinct signal kinds a zone needs
}

export const DEFAULT_CONFLUENCE_CONFIG: ConfluenceConfig = {
  tolerancePct: 0.5,
  minSignals: 3,
};

export function getConfluenceConfig(): ConfluenceConfig {
  const d = DEFAULT_CONFLUENCE_CONFIG;
  return {
    tolerancePct: envNumber('CONFLUENCE_TOLERANCE_PCT', d.tolerancePct),
    minSignals: envInt('CONFLUENCE_MIN_SIGNALS', d.minSignals),
  };
}
