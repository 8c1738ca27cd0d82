import Conf from 'conf';
import os from 'os';
import path from 'path';
import { Logger } from '../logger/logger.service';
import { MAX_WORD_LENGTH_LIMIT, MIN_WORD_LENGTH, TextSourceKind } from '../text-source/text-source.types';
import { parseDuration, parseMaxWordLength, parseTextSource } from '../../utils/utils';
import { ConfigurationError, HISTORY_FILENAME, KeystrideConfigSchema, SessionDefaults } from './config.service.types';

export class ConfigService {
    private config: Conf<KeystrideConfigSchema>;

    constructor(configName: string, private logger: Logger, configDir?: string) {
        this.config = ConfigService.openStore(configName, configDir);
        this.logger.debug(`Loaded configuration from ${this.config.path}`);
    }

    public configPath(): string {
        return this.config.path;
    }

    public getSessionDefaults(): SessionDefaults {
        return {
            durationSeconds: parseDuration(this.config.get('duration')),
            requireCorrection: this.config.get('requireCorrection'),
            textSource: parseTextSource(this.config.get('textSource')),
            maxWordLength: parseMaxWordLength(this.config.get('maxWordLength'))
        };
    }

    public historyPath(): string {
        return this.config.get('historyPath') ?? path.join(os.homedir(), HISTORY_FILENAME);
    }

    // conf validates the stored file against the schema when it is opened
    private static openStore(configName: string, configDir?: string): Conf<KeystrideConfigSchema> {
        try {
            return new Conf<KeystrideConfigSchema>({
                projectName: 'keystride',
                configName: configName,
                cwd: configDir,
                defaults: {
                    duration: 30,
                    requireCorrection: false,
                    textSource: TextSourceKind.Google,
                    maxWordLength: 7
                },
                schema: {
                    duration: {
                        type: 'integer',
                        minimum: 1
                    },
                    requireCorrection: {
                        type: 'boolean'
                    },
                    textSource: {
                        type: 'string',
                        enum: Object.values(TextSourceKind)
                    },
                    maxWordLength: {
                        type: 'integer',
                        minimum: MIN_WORD_LENGTH,
                        maximum: MAX_WORD_LENGTH_LIMIT
                    },
                    historyPath: {
                        type: 'string'
                    }
                }
            });
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigurationError(`Invalid keystride configuration: ${reason}`);
        }
    }
}
