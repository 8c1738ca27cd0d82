import { ConfigService } from './services/config/config.service';
import { Logger } from './services/logger/logger.service';
import { LoggerConfigService } from './services/logger/logger-config.service';
import { cleanExit } from './handlers/clean-exit.handler';

// Handlers
import { initLoggerMiddleware, initMiddleware } from './handlers/middleware.handler';
import { typeHandler } from './handlers/type/type.handler';
import { historyHandler } from './handlers/history/history.handler';

// 3rd Party Modules
import yargs from 'yargs';

// Cmd builders
import { typeCmdBuilder } from './handlers/type/type.command-builder';
import { historyCmdBuilder } from './handlers/history/history.command-builder';

export type EnvMap = Readonly<{
    configName: string;
    configDir: string | undefined;
}>

// Mapping from env vars to options if they exist
export const envMap: EnvMap = {
    'configName': process.env.KEYSTRIDE_CONFIG_NAME || 'default',
    'configDir' : process.env.KEYSTRIDE_CONFIG_DIR  || undefined
};

export class CliDriver
{
    private configService: ConfigService | undefined;
    private loggerConfigService: LoggerConfigService | undefined;
    private logger: Logger | undefined;

    public async start()
    {
        await this.getCliDriver().parseAsync();
    }

    public getCliDriver(argvPassed: string[] = process.argv.slice(2)) {
        return yargs(argvPassed)
            .scriptName('keystride')
            .usage('$0 [cmd] [args]')
            .wrap(null)
            .option('configName', {type: 'string', default: envMap.configName, hidden: true})
            // Overwrites the default directory used by conf. Used by tests to
            // keep an isolated configuration and log file
            .option('configDir', {type: 'string', default: envMap.configDir, hidden: true})
            .option('debug', {type: 'boolean', default: false, describe: 'Flag to show debug logs'})
            .option('silent', {type: 'boolean', default: false, describe: 'Silence all keystride messages, only returns command output'})
            .middleware((argv) => {
                // The logger is initialized before any command runs so fail()
                // below can always report through it
                const initLoggerResponse = initLoggerMiddleware(argv);
                this.logger = initLoggerResponse.logger;
                this.loggerConfigService = initLoggerResponse.loggerConfigService;
                this.logger.debug(`Writing logs to ${this.loggerConfigService.logPath()}`);
            })
            .middleware((argv) => {
                const initResponse = initMiddleware(argv, this.requireLogger());
                this.configService = initResponse.configService;
            })
            .command(
                ['type', '$0'],
                'Start a typing test',
                (yargs) => {
                    return typeCmdBuilder(yargs);
                },
                async (argv) => {
                    const exitCode = await typeHandler(argv, this.requireConfigService(), this.requireLogger());
                    await cleanExit(exitCode, this.requireLogger());
                }
            )
            .command(
                'history',
                'Show results of previous typing tests',
                (yargs) => {
                    return historyCmdBuilder(yargs);
                },
                async (argv) => {
                    const exitCode = await historyHandler(argv, this.requireConfigService(), this.requireLogger());
                    await cleanExit(exitCode, this.requireLogger());
                }
            )
            .strictCommands() // if unknown command, show help
            .strict() // any command-line argument given that is not demanded, or does not have a corresponding description, will be reported as an error.
            .help() // auto gen help message
            .showHelpOnFail(false)
            .epilog(`Keys during a test:
 - ESC or CTRL+C quits at any time
 - ENTER on the results screen starts a new test

For command specific help: keystride <cmd> --help`)
            .fail((msg, err) => {
                if (this.logger) {
                    if (msg) {
                        this.logger.error(msg);
                    }
                    if (err) {
                        this.logger.error(err.message);
                        if (err.stack)
                            this.logger.debug(err.stack);
                    }
                } else {
                    if (msg) {
                        console.error(msg);
                    }
                    if (err) {
                        console.error(err.message);
                    }
                }

                process.exit(1);
            });
    }

    // Set by the middleware above, which yargs always runs before a handler
    private requireLogger() : Logger {
        if (! this.logger)
            throw new Error('Logger used before the logger middleware ran');
        return this.logger;
    }

    private requireConfigService() : ConfigService {
        if (! this.configService)
            throw new Error('Config used before the config middleware ran');
        return this.configService;
    }
}
