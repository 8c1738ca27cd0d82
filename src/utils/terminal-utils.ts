import readline, { Key } from 'readline';
import { Logger } from '../services/logger/logger.service';
import { toTerminalCommand, TypingTerminal } from '../terminal/terminal';
import { ENTER_ALTERNATE_SCREEN, HIDE_CURSOR, LEAVE_ALTERNATE_SCREEN, SHOW_CURSOR } from '../terminal/terminal.types';

/**
 * Hands stdin/stdout to the typing terminal until the learner quits.
 * @returns The process exit code
 */
export async function createAndRunTypingSession(
    logger: Logger,
    terminal: TypingTerminal
) : Promise<number> {
    return new Promise<number>((resolve) => {
        const onKeypress = (str: string | undefined, key: Key | undefined) => {
            const command = toTerminalCommand(str, key);
            if (! command)
                return;
            try {
                terminal.handleCommand(command);
            } catch (e) {
                terminal.abort(e);
            }
        };

        const onResize = () => terminal.render();

        const restoreTerminal = () => {
            process.stdin.removeListener('keypress', onKeypress);
            process.stdout.removeListener('resize', onResize);
            if (process.stdin.isTTY) {
                process.stdin.setRawMode(false);
            }
            process.stdin.pause();
            process.stdout.write(SHOW_CURSOR + LEAVE_ALTERNATE_SCREEN);
            logger.resumeConsole();
        };

        // Subscribe first so we don't miss events
        terminal.terminalRunning.subscribe({
            // If the loop fails, put the terminal back before reporting it
            error: (error: unknown) => {
                restoreTerminal();
                terminal.dispose();
                const message = error instanceof Error ? error.stack ?? error.message : String(error);
                logger.error(`Typing session failed: ${message}`);
                resolve(1);
            },
            complete: () => {
                restoreTerminal();
                terminal.dispose();
                resolve(0);
            }
        });

        // The session owns the screen, keep log lines off it
        logger.pauseConsole();
        process.stdout.write(ENTER_ALTERNATE_SCREEN + HIDE_CURSOR);

        // To get 'keypress' events you need the following lines
        // ref: https://nodejs.org/api/readline.html#readline_readline_emitkeypressevents_stream_interface
        readline.emitKeypressEvents(process.stdin);
        if (process.stdin.isTTY) {
            process.stdin.setRawMode(true);
        }

        // Force stdin to be in flowing mode in case the stream was paused
        process.stdin.resume();
        process.stdin.on('keypress', onKeypress);
        process.stdout.on('resize', onResize);

        terminal.start();
    });
}
