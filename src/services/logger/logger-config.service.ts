import Conf from 'conf';
import path from 'path';

type LoggerConfigSchema = {
    logPath?: string
}

export class LoggerConfigService {
    private config: Conf<LoggerConfigSchema>;

    constructor(configName: string, configDir?: string) {
        this.config = new Conf<LoggerConfigSchema>({
            projectName: 'keystride-logger',
            configName: configName,
            // Overrides the conf default location, used by tests to keep an
            // isolated log file
            cwd: configDir
        });

        if (! this.config.get('logPath')) {
            this.config.set('logPath', this.generateLogPath(configName));
        }
    }

    public logPath(): string {
        return this.config.get('logPath') ?? this.generateLogPath('default');
    }

    public configPath(): string {
        return this.config.path;
    }

    private generateLogPath(configName: string): string {
        const logName = configName === 'default' ? 'keystride.log' : `keystride-${configName}.log`;
        return path.join(path.dirname(this.config.path), logName);
    }
}
