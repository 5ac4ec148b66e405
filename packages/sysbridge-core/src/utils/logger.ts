import chalk from 'chalk';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

/**
 * Map a settings-file level name ("debug", "info", ...) to a LogLevel.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
    return LEVEL_NAMES[name.toLowerCase()];
}

export class Logger {
    private static level: LogLevel = LogLevel.INFO;

    static setLevel(level: LogLevel) {
        this.level = level;
    }

    static info(message: string) {
        if (this.level <= LogLevel.INFO) {
            console.log(chalk.blue('info: ') + message);
        }
    }

    static warn(message: string) {
        if (this.level <= LogLevel.WARN) {
            console.log(chalk.yellow('warn: ') + message);
        }
    }

    static error(message: string, error?: unknown) {
        if (this.level <= LogLevel.ERROR) {
            console.error(chalk.red('error: ') + message);
            if (error) {
                console.error(error);
            }
        }
    }

    static debug(message: string) {
        if (this.level <= LogLevel.DEBUG) {
            console.log(chalk.dim('debug: ') + message);
        }
    }
}
