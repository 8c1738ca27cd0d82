import chalk from 'chalk';
import { createLogger, format, transports, Logger as WinstonLogger } from 'winston';
import { LoggerConfigService } from './logger-config.service';

const { combine, timestamp, printf, json } = format;

const logLevels = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    trace: 4
};

export type LogLevel = keyof typeof logLevels;

export class Logger {
    private logger: WinstonLogger;
    private consoleTransport: InstanceType<typeof transports.Console>;

    constructor(
        config: LoggerConfigService,
        private debugFlag: boolean,
        private silentFlag: boolean,
        isTTY: boolean
    ) {
        const consoleFormat = printf(info => {
            const message = String(info.message);
            switch (info.level) {
            case 'error':
                return chalk.red(message);
            case 'warn':
                return chalk.yellow(message);
            case 'debug':
            case 'trace':
                return chalk.gray(message);
            default:
                return message;
            }
        });

        // Errors go to stderr when there is no terminal so piped output
        // (e.g. history --json) stays parseable
        this.consoleTransport = new transports.Console({
            level: this.debugFlag ? 'trace' : 'info',
            format: consoleFormat,
            silent: this.silentFlag,
            stderrLevels: isTTY ? [] : ['error', 'warn']
        });

        this.logger = createLogger({
            levels: logLevels,
            level: 'trace',
            transports: [
                new transports.File({
                    filename: config.logPath(),
                    level: this.debugFlag ? 'trace' : 'info',
                    format: combine(timestamp(), json())
                }),
                this.consoleTransport
            ]
        });
    }

    public error(message: string): void {
        this.logger.log('error', message);
    }

    public warn(message: string): void {
        this.logger.log('warn', message);
    }

    public info(message: string): void {
        this.logger.log('info', message);
    }

    public debug(message: string): void {
        this.logger.log('debug', message);
    }

    public trace(message: string): void {
        this.logger.log('trace', message);
    }

    /**
     * Stops console output while a full-screen session owns the terminal.
     * File logging continues.
     */
    public pauseConsole(): void {
        this.consoleTransport.silent = true;
    }

    public resumeConsole(): void {
        this.consoleTransport.silent = this.silentFlag;
    }

    public flushLogs(): Promise<void> {
        return new Promise<void>(resolve => {
            this.logger.on('finish', () => resolve());
            this.logger.end();
        });
    }
}
