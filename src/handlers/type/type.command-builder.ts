import yargs from 'yargs';
import { TextSourceKind } from '../../services/text-source/text-source.types';
import { parseDuration, parseMaxWordLength, parseTextSource } from '../../utils/utils';

// Flags left unset fall back to the configured session defaults
export type typeArgs =
{duration: number | undefined} &
{requireCorrection: boolean | undefined} &
{textSource: TextSourceKind | undefined} &
{maxWordLength: number | undefined}

export function typeCmdBuilder(yargs: yargs.Argv<{}>) : yargs.Argv<typeArgs> {
    return yargs
        .option(
            'duration',
            {
                type: 'number',
                alias: 'd',
                requiresArg: true,
                coerce: parseDuration,
                description: 'Duration of the typing test in seconds [default: 30]'
            }
        )
        .option(
            'requireCorrection',
            {
                type: 'boolean',
                alias: ['c', 'require-correction'],
                description: 'Require errors to be corrected before proceeding [default: false]'
            }
        )
        .option(
            'textSource',
            {
                type: 'string',
                alias: ['s', 'text-source'],
                requiresArg: true,
                coerce: parseTextSource,
                description: 'Text source: google (common words), system (/usr/share/dict/words), builtin (sample texts) [default: google]'
            }
        )
        .option(
            'maxWordLength',
            {
                type: 'number',
                alias: ['m', 'max-word-length'],
                requiresArg: true,
                coerce: parseMaxWordLength,
                description: 'Maximum word length when using word lists, 3 to 20 [default: 7]'
            }
        )
        .example('$0', 'Start a 30 second test with common words')
        .example('$0 -d 60 -c', 'One minute test, mistakes must be corrected')
        .example('$0 -s system -m 10', 'Use the system dictionary with words up to 10 letters');
}
