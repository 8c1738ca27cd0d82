import { Logger } from '../services/logger/logger.service';
import { ConfigService } from '../services/config/config.service';
import { LoggerConfigService } from '../services/logger/logger-config.service';

export type GlobalArgs = {
    configName: string;
    configDir: string | undefined;
    debug: boolean;
    silent: boolean;
}

export function initLoggerMiddleware(argv: GlobalArgs) {
    // Configure our logger
    const loggerConfigService = new LoggerConfigService(argv.configName, argv.configDir);

    // isTTY detects whether the process is being run with a text terminal
    // ("TTY") attached. Without one, errors and warnings go to stderr so
    // piped output stays clean
    const logger = new Logger(loggerConfigService, !! argv.debug, !! argv.silent, !! process.stdout.isTTY);

    return {
        logger: logger,
        loggerConfigService: loggerConfigService
    };
}

export function initMiddleware(argv: GlobalArgs, logger: Logger) {
    const configService = new ConfigService(argv.configName, logger, argv.configDir);
    logger.debug(`Using history file ${configService.historyPath()}`);

    return {
        configService: configService
    };
}
