import { CommandRunner } from './core/processRunner';
import { LaunchError } from './errors';
import logger from './logger';

async function commandExists(
    runner: CommandRunner,
    command: string,
): Promise<boolean> {
    if (!command) {
        return false;
    }
    try {
        const status = await runner.run(command, ['--version'], {
            timeoutMs: 10000,
        });
        return status.code === 0;
    } catch (err) {
        if (err instanceof LaunchError) {
            return false;
        }
        throw err;
    }
}

async function assertPacman(runner: CommandRunner, pacman: string) {
    if (!(await commandExists(runner, pacman))) {
        logger.error(`Command ${pacman} not found. Is this an Arch based system?`);
        process.exit(1);
    }
}

export { assertPacman, commandExists };
