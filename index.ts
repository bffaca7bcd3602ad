import { CacheService } from './services/cacheService';
import { parseCliArgs, USAGE } from './services/cli';
import { loadConfig } from './services/config';
import { FmpDataProvider } from './services/dataProvider';
import { describeError } from './services/errors';
import { generateMemo } from './services/geminiService';
import { createLogger, setLogLevel } from './services/logger';
import { run_valuation } from './services/pipeline';
import { format_cache_info } from './services/report';

const log = createLogger('cli');

const main = async (argv: string[]): Promise<number> => {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const config = loadConfig();
    setLogLevel(config.logLevel);
    const cache = new CacheService(config.cache.directory, config.cache.ttlHours);

    if (options.cacheInfo) {
      console.log(format_cache_info(await cache.info()));
      return 0;
    }
    if (options.clearCache) {
      await cache.clear();
    }
    if (!options.ticker) return 0;

    const provider = new FmpDataProvider({
      apiKey: options.apiKey ?? config.api.apiKey,
      baseUrl: config.api.baseUrl,
      timeoutMs: config.api.timeoutMs,
      maxRetries: config.api.maxRetries,
      cache: options.useCache ? cache : null,
    });

    const run = await run_valuation(
      {
        ticker: options.ticker,
        assumptions: options.assumptions,
        wacc: options.wacc,
        history: options.history,
        interval: options.interval,
        sensitivity: options.sensitivity,
        step: options.step,
        chart: options.chart,
        memo: options.memo,
      },
      {
        provider,
        writeMemo: (context) => generateMemo(context, config.gemini),
      },
    );

    console.log(run.report);
    return 0;
  } catch (error) {
    log.debug('Run failed', error);
    console.error(describeError(error));
    return 1;
  }
};

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
  },
);
