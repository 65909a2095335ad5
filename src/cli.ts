/**
 * Command-line arguments
 */

import { parseArgs } from 'node:util';
import { ConfigError } from './types/errors';
import { classifyOutcome } from './polymarket/discovery';

export interface CliArgs {
  configPath: string;
  redeem: boolean;
  conditionId?: string;
  outcome?: 'Up' | 'Down';
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c', default: 'config.json' },
      redeem: { type: 'boolean', default: false },
      'condition-id': { type: 'string' },
      outcome: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  const redeem = values.redeem === true;
  const conditionId = values['condition-id'];
  if (redeem && !conditionId) {
    throw new ConfigError('--redeem needs --condition-id <id>', '--condition-id');
  }

  let outcome: CliArgs['outcome'];
  if (values.outcome !== undefined) {
    const side = classifyOutcome(values.outcome);
    if (!side) {
      throw new ConfigError('must be Up or Down', '--outcome');
    }
    outcome = side;
  }

  return {
    configPath: values.config ?? 'config.json',
    redeem,
    conditionId,
    outcome,
  };
}
