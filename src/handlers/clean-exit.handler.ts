import { Logger } from '../services/logger/logger.service';


export async function cleanExit(exitCode: number, logger: Logger) : Promise<void> {
    if (exitCode != 0) {
        logger.debug(`Exiting with code ${exitCode}`);
    }

    // Make sure everything reaches the log file before the process goes away
    await logger.flushLogs();
    process.exit(exitCode);
}
