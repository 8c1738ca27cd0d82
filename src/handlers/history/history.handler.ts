import { takeRight } from 'lodash';
import yargs from 'yargs';
import { ConfigService } from '../../services/config/config.service';
import { ConfigurationError } from '../../services/config/config.service.types';
import { HistoryRecorderService } from '../../services/history/history-recorder.service';
import { Logger } from '../../services/logger/logger.service';
import { getTableOfHistory } from '../../utils/utils';
import { historyArgs } from './history.command-builder';

export async function historyHandler(
    argv: yargs.Arguments<historyArgs>,
    configService: ConfigService,
    logger: Logger
) : Promise<number> {
    if (! Number.isInteger(argv.limit) || argv.limit <= 0) {
        throw new ConfigurationError(`Limit must be a positive integer, got '${argv.limit}'`);
    }

    const historyRecorder = new HistoryRecorderService(configService.historyPath(), logger);
    const records = takeRight(historyRecorder.readAll(), argv.limit);

    if (argv.json) {
        console.log(JSON.stringify(records));
    } else if (records.length === 0) {
        logger.info(`No sessions recorded yet in ${historyRecorder.path}`);
    } else {
        console.log(getTableOfHistory(records));
    }

    return 0;
}
