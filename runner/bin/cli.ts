#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { InitModule } from '../init-cli.js';
import { AnalyzeModule } from '../analyze-cli.js';
import { CompareModule } from '../compare-cli.js';
import { TemplatesModule } from '../templates-cli.js';
import { PromptsModule } from '../prompts-cli.js';
import { RateModule } from '../rate-cli.js';
import { EvaluationsModule } from '../evaluations-cli.js';
import { StatsModule } from '../stats-cli.js';
import { MigrateModule } from '../migrate-cli.js';
import { ServeModule } from '../serve-cli.js';

yargs()
  .scriptName('response-rater')
  .demandCommand()
  .recommendCommands()
  .command(InitModule.command, InitModule.describe, InitModule)
  .command(AnalyzeModule.command, AnalyzeModule.describe, AnalyzeModule)
  .command(CompareModule.command, CompareModule.describe, CompareModule)
  .command(TemplatesModule.command, TemplatesModule.describe, TemplatesModule)
  .command(PromptsModule.command, PromptsModule.describe, PromptsModule)
  .command(RateModule.command, RateModule.describe, RateModule)
  .command(
    EvaluationsModule.command,
    EvaluationsModule.describe,
    EvaluationsModule
  )
  .command(StatsModule.command, StatsModule.describe, StatsModule)
  .command(MigrateModule.command, MigrateModule.describe, MigrateModule)
  .command(ServeModule.command, ServeModule.describe, ServeModule)
  .wrap(120)
  .strict()
  .help()
  .version(false)
  .parse(hideBin(process.argv));
