#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';
import { errorMessage, isSymflowError, type SymflowError } from './control-plane/errors.js';

function printRemediation(err: SymflowError): void {
  console.error('\n[symflow] Remediation suggestions:');
  switch (err.code) {
    case 'MODE_ERROR':
      console.error('  - Run a full analysis first, or pass --overwrite to replace an existing entry');
      console.error('  - Check the cache key with: symflow history -s <symbol>');
      break;
    case 'NOT_FOUND':
      console.error('  - Pick a later test date, or list cached entries with: symflow history -s <symbol>');
      break;
    case 'PARAMETER_ERROR':
      console.error('  - Check the input readings and --params overrides against the default types');
      break;
    case 'STAGE_ERROR':
      console.error('  - The stage inputs are incomplete; supply the missing market readings');
      break;
    case 'CACHE_IO_ERROR':
      console.error('  - Check CACHE_DIR permissions, or remove a stale .lock file if no run is active');
      break;
    case 'NARRATIVE_ERROR':
      console.error('  - Set OPENAI_API_KEY, or run without --narrate');
      break;
  }
}

const program = buildCli();
program.parseAsync(process.argv).catch((err: unknown) => {
  if (isSymflowError(err)) {
    console.error(`symflow: ${err.describe()}`);
    printRemediation(err);
    process.exit(2);
  }
  console.error(`symflow: ${errorMessage(err)}`);
  process.exit(1);
});
