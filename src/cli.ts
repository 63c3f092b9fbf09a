#!/usr/bin/env node

import { Command } from 'commander';
import {
  parseDetectionMode,
  parseDistanceModel,
  parseInteger,
  parseLevel,
  parseNumber
} from './cli/options';
import { simulateCommand } from './cli/simulate';
import type { LogLevel } from './lib/logger';
import type { DetectionMode, DistanceModel } from './store/types';

const DEFAULT_TICKS = 60;

const program = new Command();

program
  .name('naval-sim')
  .description('Tick-driven naval wargame simulation')
  .version('0.1.0');

program
  .command('simulate <scenario>')
  .description('Run a scenario file (or a bundled scenario by name) and print its events')
  .option('-t, --ticks <n>', 'Number of ticks to run', parseInteger, DEFAULT_TICKS)
  .option('-r, --time-rate <seconds>', 'Game seconds per tick', parseNumber)
  .option('-s, --seed <n>', 'Seed for probabilistic rolls', parseInteger)
  .option('-g, --grace <ticks>', 'Ticks a sinking unit stays before removal', parseInteger)
  .option('-d, --detection <mode>', 'deterministic | probabilistic', parseDetectionMode)
  .option('--distance <model>', 'planar | great-circle | vincenty', parseDistanceModel)
  .option('-l, --log-level <level>', 'silent | error | warn | info | debug', parseLevel)
  .action(async (scenario: string, opts: {
    ticks: number;
    timeRate?: number;
    seed?: number;
    grace?: number;
    detection?: DetectionMode;
    distance?: DistanceModel;
    logLevel?: LogLevel;
  }) => {
    process.exitCode = await simulateCommand(scenario, opts);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
