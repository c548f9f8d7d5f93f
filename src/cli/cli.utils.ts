/**
 * Console Output Helpers
 *
 * Everything the CLI prints goes through here. Status lines go to stdout;
 * warnings, errors and the progress spinner go to stderr.
 */

// ============================================================================
// ICONS & COLORS
// ============================================================================

export const ICONS = {
    success: "✓",
    error: "✗",
    info: "ℹ",
    warning: "⚠"
} as const;

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m'
};

export type ColorName = keyof typeof colors;

export function colorize(text: string, color: ColorName): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

const BYTE_UNITS = ['Bytes', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
    if (bytes === 0) return '0 Bytes';
    const unit = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), BYTE_UNITS.length - 1);
    return `${Math.round((bytes / Math.pow(1024, unit)) * 100) / 100} ${BYTE_UNITS[unit]}`;
}

/**
 * Short run-time label: "250ms", "4s", "2m 5s", "1h 2m"
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) {
        return `${Math.round(ms)}ms`;
    }
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);

    if (hours > 0) return `${hours}h ${minutes % 60}m`;
    if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
    return `${seconds}s`;
}

// ============================================================================
// PROGRESS
// ============================================================================

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Animated status line on stderr for --progress. When stderr is not a
 * terminal, each new message is printed once on its own line instead.
 */
export class ProgressSpinner {
    private timer: NodeJS.Timeout | null = null;
    private frame = 0;

    constructor(
        private message: string,
        private readonly stream: NodeJS.WriteStream = process.stderr
    ) {}

    start(): void {
        if (this.timer) return;
        if (!this.stream.isTTY) {
            this.stream.write(`${this.message}\n`);
            return;
        }
        this.stream.write('\x1b[?25l'); // hide cursor
        this.timer = setInterval(() => this.render(), 100);
    }

    setMessage(message: string): void {
        this.message = message;
        if (!this.stream.isTTY) {
            this.stream.write(`${message}\n`);
        }
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
        this.stream.write(`\r${' '.repeat(this.stream.columns ?? 80)}\r`);
        this.stream.write('\x1b[?25h'); // show cursor
    }

    private render(): void {
        const frame = SPINNER_FRAMES[this.frame] ?? '';
        this.stream.write(`\r${colorize(frame, 'cyan')} ${this.message}`);
        this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
    }
}

// ============================================================================
// STATUS LINES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(ICONS.success, 'green')} ${colorize(message, 'green')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(ICONS.info, 'blue')} ${message}`);
}

export function logWarning(message: string): void {
    console.error(`${colorize(ICONS.warning, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logError(message: string): void {
    console.error(`${colorize(ICONS.error, 'red')} ${colorize(message, 'red')}`);
}

export function logHeader(title: string): void {
    const rule = '═'.repeat(title.length + 4);
    console.log(`\n${colorize(rule, 'cyan')}`);
    console.log(colorize(`  ${title}  `, 'cyan'));
    console.log(`${colorize(rule, 'cyan')}\n`);
}

/**
 * Configuration problems: the message plus a pointer to --help.
 */
export function showError(message: string): void {
    logError(message);
    console.error(colorize('Run with --help to see usage information.', 'dim'));
}

// ============================================================================
// TABLES
// ============================================================================

/**
 * Prints label/value pairs as a two-column box, values right-aligned:
 *
 *   ┌─────────┬───────┐
 *   │ Parsed  │ 1,204 │
 *   └─────────┴───────┘
 */
export function printKeyValueTable(rows: ReadonlyArray<readonly [string, string]>): void {
    const labelWidth = Math.max(...rows.map(([label]) => label.length));
    const valueWidth = Math.max(...rows.map(([, value]) => value.length));
    const left = '─'.repeat(labelWidth + 2);
    const right = '─'.repeat(valueWidth + 2);

    console.log(`┌${left}┬${right}┐`);
    for (const [label, value] of rows) {
        console.log(`│ ${colorize(label.padEnd(labelWidth), 'bright')} │ ${value.padStart(valueWidth)} │`);
    }
    console.log(`└${left}┴${right}┘`);
}
