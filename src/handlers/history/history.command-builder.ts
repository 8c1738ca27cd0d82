import yargs from 'yargs';

export type historyArgs =
{limit: number} &
{json: boolean}

export function historyCmdBuilder(yargs: yargs.Argv<{}>) : yargs.Argv<historyArgs> {
    return yargs
        .option(
            'limit',
            {
                type: 'number',
                default: 10,
                alias: 'l',
                requiresArg: true,
                description: 'Number of most recent sessions to show'
            }
        )
        .option(
            'json',
            {
                type: 'boolean',
                default: false,
                alias: 'j',
                description: 'Output as json, pipeable'
            }
        )
        .example('$0 history', 'Show the last 10 sessions')
        .example('$0 history -l 50 --json --silent', 'Last 50 sessions as json');
}
