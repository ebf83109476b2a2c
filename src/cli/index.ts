import { runHeadlessSimulation, type SimulationInput } from './simulate';
import { runTuningBot, type TuningBotOptions } from './tuning-bot';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

export const USAGE = 'Usage: orbital-dodge <simulate|tune> [options]';

interface MutableSimulateOptions {
    seed?: number;
    durationSec?: number;
    bot?: boolean;
    replayOut?: string;
    challenge?: string;
    tickRate?: number;
}

const parseNumber = (value: string | undefined): number | undefined => {
    if (value === undefined) {
        return undefined;
    }
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
};

const parseSimulateArgs = (args: string[]): SimulationInput => {
    const options: MutableSimulateOptions = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const value = i + 1 < args.length ? args[i + 1] : undefined;
        if (arg === '--seed' && value !== undefined) {
            options.seed = parseNumber(value);
            i++;
        } else if (arg === '--duration' && value !== undefined) {
            options.durationSec = parseNumber(value);
            i++;
        } else if (arg === '--tick-rate' && value !== undefined) {
            options.tickRate = parseNumber(value);
            i++;
        } else if (arg === '--replay-out' && value !== undefined) {
            options.replayOut = value;
            i++;
        } else if (arg === '--challenge' && value !== undefined) {
            options.challenge = value;
            i++;
        } else if (arg === '--bot') {
            options.bot = true;
        } else if (arg === '--no-bot') {
            options.bot = false;
        }
    }
    return options;
};

const parseTuneArgs = (args: string[]): TuningBotOptions => {
    let runs = 5;
    let durationSec = 120;
    let seed: number | undefined;
    let bot = true;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const value = i + 1 < args.length ? args[i + 1] : undefined;
        if (arg === '--runs' && value !== undefined) {
            runs = parseNumber(value) ?? runs;
            i++;
        } else if (arg === '--duration' && value !== undefined) {
            durationSec = parseNumber(value) ?? durationSec;
            i++;
        } else if (arg === '--seed' && value !== undefined) {
            seed = parseNumber(value);
            i++;
        } else if (arg === '--no-bot') {
            bot = false;
        }
    }

    return { runs, durationSec, seed, bot } satisfies TuningBotOptions;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function createCli(): CliCommand {
    const execute = async (): Promise<number> => {
        const args = process.argv.slice(2);
        const command = args[0];
        const restArgs = args.slice(1);

        if (command === 'simulate') {
            try {
                const result = await runHeadlessSimulation(parseSimulateArgs(restArgs));
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Simulation failed: ${describeError(error)}`);
                return 1;
            }
        }

        if (command === 'tune') {
            try {
                const result = await runTuningBot(parseTuneArgs(restArgs));
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Tuning bot failed: ${describeError(error)}`);
                return 1;
            }
        }

        console.error(USAGE);
        return 1;
    };

    return {
        execute,
    };
}
