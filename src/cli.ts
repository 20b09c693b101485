import { parseArgs } from 'node:util';
import type { ConfigOverrides } from './config.js';

export interface CliOptions {
  help: boolean;
  overrides: ConfigOverrides;
}

export const USAGE = [
  'Usage: crypto-signal-watcher [options]',
  '',
  'Options:',
  '  -t, --enable-trading   Place market orders for BUY/SELL signals this session',
  '      --disable-trading  Never place orders, even if TRADING_ENABLED=true',
  '  -h, --help             Show this message',
].join('\n');

/**
 * Parse command line flags. Unknown flags throw a TypeError from parseArgs.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      'enable-trading': { type: 'boolean', short: 't', default: false },
      'disable-trading': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  const enable = values['enable-trading'] === true;
  const disable = values['disable-trading'] === true;
  if (enable && disable) {
    throw new TypeError('--enable-trading and --disable-trading cannot be combined');
  }

  const overrides: ConfigOverrides = {};
  if (enable) overrides.tradingEnabled = true;
  if (disable) overrides.tradingEnabled = false;

  return { help: values.help === true, overrides };
}
