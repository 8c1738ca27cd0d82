import yargs from 'yargs';
import { ConfigService } from '../../services/config/config.service';
import { SessionDefaults } from '../../services/config/config.service.types';
import { HistoryRecorderService } from '../../services/history/history-recorder.service';
import { Logger } from '../../services/logger/logger.service';
import { loadTextCorpus, TextSourceService } from '../../services/text-source/text-source.service';
import { TypingTerminal } from '../../terminal/terminal';
import { TypingSessionConfig } from '../../terminal/terminal.types';
import { createAndRunTypingSession } from '../../utils/terminal-utils';
import { typeArgs } from './type.command-builder';

export function resolveSessionConfig(argv: typeArgs, defaults: SessionDefaults) : TypingSessionConfig
{
    return {
        durationSeconds: argv.duration ?? defaults.durationSeconds,
        requireCorrection: argv.requireCorrection ?? defaults.requireCorrection,
        textSource: argv.textSource ?? defaults.textSource,
        maxWordLength: argv.maxWordLength ?? defaults.maxWordLength
    };
}

export async function typeHandler(
    argv: yargs.Arguments<typeArgs>,
    configService: ConfigService,
    logger: Logger
) : Promise<number> {
    const sessionConfig = resolveSessionConfig(argv, configService.getSessionDefaults());
    logger.debug(`Session config: ${JSON.stringify(sessionConfig)}`);

    if (! process.stdin.isTTY || ! process.stdout.isTTY) {
        logger.error('A typing session needs an interactive terminal');
        return 1;
    }

    const textSourceService = new TextSourceService(logger, loadTextCorpus());
    const historyRecorder = new HistoryRecorderService(configService.historyPath(), logger);
    const terminal = new TypingTerminal(logger, textSourceService, historyRecorder, sessionConfig, process.stdout);

    return await createAndRunTypingSession(logger, terminal);
}
