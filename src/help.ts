import { packageInfo } from './version.js';

type Log = (msg: string) => void;

export function printVersion(log: Log): void {
  log(`${packageInfo.name} ${packageInfo.version}`);
}

export function printUsage(log: Log): void {
  log(`${packageInfo.name} ${packageInfo.version}`);
  log('');
  log('Usage: termbuf [options] <files...>');
  log('');
  log('Prints one frame of each file: line numbers, the visible rows and a status line.');
  log('File arguments may be glob patterns.');
  log('');
  log('Options:');
  log('  -t, --tab-width <n>  Columns per tab (overrides config)');
  log('  -W, --width <n>      Viewport width in columns (default: terminal width)');
  log('  -H, --height <n>     Viewport height in rows (default: terminal height - 1)');
  log('  -l, --line <n>       Scroll so line n is in view');
  log('  --init-config        Write a default config file');
  log('  --print-schema       Print the JSON Schema of the config file');
  log('  -v, --version        Show version information');
  log('  -h, --help, -?       Show this help message');
}
