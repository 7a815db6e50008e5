/**
 * Operator-facing status lines.
 *
 * One tagged line per event (`[INFO]`, `[SUCCESS]`, `[WARNING]`, `[ERROR]`),
 * coloured when enabled. Structured records go to the pino logger instead.
 */

export interface SequenceReporter {
  header(title: string): void;
  section(title: string): void;
  stepStarted(index: number, total: number, title: string): void;
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Untagged line */
  line(text?: string): void;
}

export interface ConsoleReporterOptions {
  color?: boolean;
  write?: (text: string) => void;
}

const ANSI = {
  red: '\u001b[0;31m',
  green: '\u001b[0;32m',
  yellow: '\u001b[1;33m',
  blue: '\u001b[0;34m',
  reset: '\u001b[0m',
} as const;

type Tone = Exclude<keyof typeof ANSI, 'reset'>;

const RULE = '='.repeat(78);

export function createConsoleReporter(options: ConsoleReporterOptions = {}): SequenceReporter {
  const color = options.color ?? false;
  const write = options.write ?? ((text: string) => process.stdout.write(text));

  const paint = (tone: Tone, text: string): string =>
    color ? `${ANSI[tone]}${text}${ANSI.reset}` : text;
  const emit = (text: string): void => write(`${text}\n`);
  const tagged = (tone: Tone, tag: string, message: string): void =>
    emit(`${paint(tone, `[${tag}]`)} ${message}`);

  const banner = (title: string): void => {
    emit('');
    emit(RULE);
    emit(`  ${title}`);
    emit(RULE);
    emit('');
  };

  return {
    header: banner,
    section: banner,
    stepStarted(index, total, title) {
      tagged('blue', 'INFO', `Step ${index}/${total}: ${title}...`);
    },
    info(message) {
      tagged('blue', 'INFO', message);
    },
    success(message) {
      tagged('green', 'SUCCESS', message);
    },
    warning(message) {
      tagged('yellow', 'WARNING', message);
    },
    error(message) {
      tagged('red', 'ERROR', message);
    },
    line(text = '') {
      emit(text);
    },
  };
}

/**
 * Reporter that discards everything.
 */
export function createSilentReporter(): SequenceReporter {
  const ignore = (): void => undefined;
  return {
    header: ignore,
    section: ignore,
    stepStarted: ignore,
    info: ignore,
    success: ignore,
    warning: ignore,
    error: ignore,
    line: ignore,
  };
}
