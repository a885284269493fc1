import { Command } from 'commander';
import { getConfig } from '../config.js';
import { analyze, backtest, createWorkspace, history, refresh, type Workspace } from '../control-plane/entrypoints.js';
import { ModeError, ParameterError } from '../control-plane/errors.js';
import { RUN_MODES, type RunMode, type RunState } from '../control-plane/types.js';
import { narrateRun } from '../report/narrator.js';
import { emitReport, renderHistoryTable, type ReportFormat } from '../report/render.js';

interface ReportCliOptions {
  format: string;
  out?: string;
  narrate?: boolean;
}

interface AnalyzeCliOptions extends ReportCliOptions {
  symbol: string;
  mode: string;
  input?: string;
  cacheKey?: string;
  params?: string;
  overwrite?: boolean;
  testDate?: string;
}

interface RefreshCliOptions extends ReportCliOptions {
  symbol: string;
  input: string;
  cacheKey?: string;
  params?: string;
}

interface BacktestCliOptions extends ReportCliOptions {
  symbol: string;
  date: string;
  input?: string;
}

interface HistoryCliOptions {
  symbol: string;
  format: string;
}

export function parseMode(value: string): RunMode {
  const mode = RUN_MODES.find((m) => m === value.trim().toLowerCase());
  if (!mode) {
    throw new ModeError(`Unknown mode "${value}" (expected one of: ${RUN_MODES.join(', ')})`);
  }
  return mode;
}

export function parseReportFormat(value: string): ReportFormat {
  if (value === 'json' || value === 'md') return value;
  throw new ParameterError('format', `Unknown format "${value}" (expected json or md)`);
}

async function report(workspace: Workspace, state: RunState, opts: ReportCliOptions): Promise<void> {
  const format = parseReportFormat(opts.format);
  const narrative = opts.narrate ? await narrateRun(state, workspace.config.openai) : undefined;
  const outDir = opts.out ?? workspace.config.outputDir;
  const { reportPath, ledgerPath } = await emitReport(state, outDir, format, narrative);

  const strategy = state.stage_results.strategy_calc?.output;
  const comparison = state.stage_results.comparison?.output;
  if (strategy) {
    console.log(`\n[symflow] ${state.symbol}: ${strategy.strategy} (score ${strategy.score.toFixed(2)})`);
  }
  if (comparison) {
    const fields = comparison.significant_fields.join(', ') || 'none';
    console.log(`[symflow] material change: ${comparison.material_change ? 'yes' : 'no'} (significant: ${fields})`);
  }
  console.log(`[symflow] done. Report written to ${reportPath}`);
  if (ledgerPath) console.log(`[symflow] ledger: ${ledgerPath}`);
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('symflow')
    .description(
      'Cache-centric market analysis pipeline.\n\n' +
      'Runs event detection, scoring and strategy selection for one symbol, keeps one\n' +
      'JSON cache document per symbol and date, and replays history for backtests.'
    )
    .version('0.1.0');

  program
    .command('analyze')
    .description('Run the stage pipeline for a symbol in the given mode')
    .requiredOption('-s, --symbol <symbol>', 'Symbol (e.g., NVDA)')
    .option('-m, --mode <mode>', `Run mode: ${RUN_MODES.join(', ')}`, 'full')
    .option('-i, --input <source>', 'Input folder, .json file or inline JSON')
    .option('-c, --cache-key <key>', 'Cache key (default: <SYMBOL>_<YYYYMMDD> or the latest entry)')
    .option('--params <json>', 'Dyn param overrides as a JSON object')
    .option('--overwrite', 'Allow a full run to replace an existing cache entry')
    .option('-d, --test-date <date>', 'Test date for backtest mode (YYYY-MM-DD)')
    .option('--format <format>', 'Report format: json or md', 'json')
    .option('--out <path>', 'Report directory (default: OUTPUT_DIR)')
    .option('--narrate', 'Append an LLM-written narrative (requires OPENAI_API_KEY)')
    .action(async (opts: AnalyzeCliOptions) => {
      const workspace = createWorkspace(getConfig());
      const state = await analyze(workspace, opts.symbol, parseMode(opts.mode), opts.input, opts.cacheKey, {
        overwrite: opts.overwrite === true,
        params: opts.params,
        testDate: opts.testDate,
      });
      await report(workspace, state, opts);
    });

  program
    .command('refresh')
    .description('Compare fresh market readings against the cached snapshot')
    .requiredOption('-s, --symbol <symbol>', 'Symbol (e.g., NVDA)')
    .requiredOption('-i, --input <source>', 'Input folder, .json file or inline JSON')
    .option('-c, --cache-key <key>', 'Cache key (default: the latest entry of the symbol)')
    .option('--params <json>', 'Dyn param overrides as a JSON object')
    .option('--format <format>', 'Report format: json or md', 'json')
    .option('--out <path>', 'Report directory (default: OUTPUT_DIR)')
    .option('--narrate', 'Append an LLM-written narrative (requires OPENAI_API_KEY)')
    .action(async (opts: RefreshCliOptions) => {
      const workspace = createWorkspace(getConfig());
      const state = await refresh(workspace, opts.symbol, opts.input, opts.cacheKey, {
        params: opts.params,
      });
      await report(workspace, state, opts);
    });

  program
    .command('history')
    .description('List cached analyses of a symbol, oldest first')
    .requiredOption('-s, --symbol <symbol>', 'Symbol (e.g., NVDA)')
    .option('--format <format>', 'Output format: table or json', 'table')
    .action(async (opts: HistoryCliOptions) => {
      if (opts.format !== 'table' && opts.format !== 'json') {
        throw new ParameterError('format', `Unknown format "${opts.format}" (expected table or json)`);
      }
      const records = await history(createWorkspace(getConfig()), opts.symbol);
      console.log(opts.format === 'json' ? JSON.stringify(records, null, 2) : renderHistoryTable(records));
    });

  program
    .command('backtest')
    .description('Re-run the pipeline on the cache entry in effect at a past date')
    .requiredOption('-s, --symbol <symbol>', 'Symbol (e.g., NVDA)')
    .requiredOption('-d, --date <date>', 'Test date (YYYY-MM-DD)')
    .option('-i, --input <source>', 'Outcome readings to compare against the historical snapshot')
    .option('--format <format>', 'Report format: json or md', 'json')
    .option('--out <path>', 'Report directory (default: OUTPUT_DIR)')
    .option('--narrate', 'Append an LLM-written narrative (requires OPENAI_API_KEY)')
    .action(async (opts: BacktestCliOptions) => {
      const workspace = createWorkspace(getConfig());
      const state = await backtest(workspace, opts.symbol, opts.date, opts.input);
      await report(workspace, state, opts);
    });

  return program;
}
