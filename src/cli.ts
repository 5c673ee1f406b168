import path from "node:path";
import { promises as fs } from "node:fs";
import { parseArgs } from "node:util";
import {MusicSymbolDetector} from "./analysis/music-symbol-detector";
import {AudiverisRecognizer} from "./recognizers/audiveris.recognizer";
import {loadEnv} from "./config/env";
import {CoordinateSpace} from "./types/detection.types";
import {errorMessage, OmrError, UsageError, WriteError} from "./types/errors";
import {createLogger, Logger} from "./utils/logger";

export const USAGE = `Usage: omr-annotate <input_image> [options]

Runs Audiveris on a sheet music image and draws boxes around noteheads,
sharps, flats and naturals.

Options:
  -o, --output <path>       annotated image (default: <name>_detected.<ext>)
  -a, --audiveris <path>    Audiveris launcher or JAR (default: $AUDIVERIS_PATH, then search)
  -w, --workdir <dir>       recognizer output directory (default: <input dir>/audiveris_output)
  -t, --timeout <ms>        recognizer timeout (default: $OMR_TIMEOUT_MS or 300000)
      --coords <space>      recognizer | original (default: $OMR_COORDINATE_SPACE or recognizer)
      --json <path>         write the run report as JSON
  -v, --verbose             debug logging
  -h, --help                show this help`;

type CliArgs = {
    input: string;
    output?: string;
    audiveris?: string;
    workdir?: string;
    timeoutMs?: number;
    coords?: CoordinateSpace;
    json?: string;
    verbose: boolean;
    help: boolean;
};

const CLI_OPTIONS = {
    output: { type: 'string', short: 'o' },
    audiveris: { type: 'string', short: 'a' },
    workdir: { type: 'string', short: 'w' },
    timeout: { type: 'string', short: 't' },
    coords: { type: 'string' },
    json: { type: 'string' },
    verbose: { type: 'boolean', short: 'v', default: false },
    help: { type: 'boolean', short: 'h', default: false },
} as const;

function readArgs(argv: string[]) {
    try {
        return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
    } catch (err) {
        throw new UsageError(`${errorMessage(err)}\n\n${USAGE}`, { cause: err });
    }
}

export function parseCliArgs(argv: string[]): CliArgs {
    const parsed = readArgs(argv);
    const { values, positionals } = parsed;
    const help = values.help ?? false;
    if (!help && positionals.length !== 1) {
        throw new UsageError(
            positionals.length === 0 ? `Missing input image\n\n${USAGE}` : `Expected one input image, got ${positionals.length}\n\n${USAGE}`
        );
    }

    let timeoutMs: number | undefined;
    if (values.timeout !== undefined) {
        timeoutMs = Number(values.timeout);
        if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
            throw new UsageError(`--timeout must be a positive integer (milliseconds), got "${values.timeout}"`);
        }
    }

    let coords: CoordinateSpace | undefined;
    if (values.coords !== undefined) {
        if (values.coords !== 'recognizer' && values.coords !== 'original') {
            throw new UsageError(`--coords must be "recognizer" or "original", got "${values.coords}"`);
        }
        coords = values.coords;
    }

    return {
        input: positionals[0] ?? '',
        output: values.output,
        audiveris: values.audiveris,
        workdir: values.workdir,
        timeoutMs,
        coords,
        json: values.json,
        verbose: values.verbose ?? false,
        help,
    };
}

/** Runs one detection and returns the process exit code. */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    let log: Logger = createLogger();
    try {
        const args = parseCliArgs(argv);
        if (args.help) {
            console.log(USAGE);
            return 0;
        }
        const config = loadEnv(env);
        log = createLogger({
            level: args.verbose ? 'debug' : config.LOG_LEVEL,
            format: config.NODE_ENV === 'production' ? 'json' : 'pretty',
        });

        const recognizer = new AudiverisRecognizer({
            executablePath: args.audiveris ?? config.AUDIVERIS_PATH,
            javaHome: config.AUDIVERIS_JAVA_HOME,
            timeoutMs: args.timeoutMs ?? config.OMR_TIMEOUT_MS,
            env,
            logger: log.child({ component: 'audiveris' }),
        });
        const detector = new MusicSymbolDetector(recognizer, {
            minWidth: config.OMR_MIN_WIDTH,
            minHeight: config.OMR_MIN_HEIGHT,
            scaleFactor: config.OMR_SCALE_FACTOR,
            coordinateSpace: args.coords ?? config.OMR_COORDINATE_SPACE,
            logger: log,
        });

        const result = await detector.process(args.input, {
            outputPath: args.output,
            workingDir: args.workdir,
        });

        if (args.json) {
            const jsonPath = path.resolve(args.json);
            try {
                await fs.writeFile(jsonPath, JSON.stringify(result, null, 2), 'utf8');
            } catch (err) {
                throw new WriteError(`Cannot write report ${jsonPath}: ${errorMessage(err)}`, { cause: err });
            }
            log.info('Report saved', { report: jsonPath });
        }
        return 0;
    } catch (err) {
        if (err instanceof OmrError) {
            log.error(`${err.name}: ${err.message}`);
            return err.exitCode;
        }
        log.error('Unexpected failure', err);
        return 1;
    }
}
