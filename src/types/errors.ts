export const INSTALL_GUIDANCE =
    'Install Audiveris from https://github.com/Audiveris/audiveris/releases ' +
    'and pass its launcher or JAR with -a/--audiveris (or set AUDIVERIS_PATH).';

/** Base class for every failure the CLI reports. `exitCode` is the process exit status. */
export class OmrError extends Error {
    readonly exitCode: number = 1;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UsageError extends OmrError {
    readonly exitCode = 2;
}

/** The input image is missing, unreadable or not an image. */
export class InputError extends OmrError {
    readonly exitCode = 3;
}

export class RecognizerNotFoundError extends OmrError {
    readonly exitCode = 4;
    readonly executablePath?: string;

    constructor(executablePath?: string, options?: { cause?: unknown }) {
        super(
            executablePath
                ? `Audiveris executable not found: ${executablePath}\n${INSTALL_GUIDANCE}`
                : `Audiveris executable not found in known locations or PATH.\n${INSTALL_GUIDANCE}`,
            options
        );
        this.executablePath = executablePath;
    }
}

/** The recognizer ran but exited non-zero or was killed on timeout. */
export class RecognizerFailureError extends OmrError {
    readonly exitCode = 5;
    readonly processExitCode: number | null;
    readonly stderr: string;
    readonly timedOut: boolean;

    constructor(
        message: string,
        details: { processExitCode?: number | null; stderr?: string; timedOut?: boolean },
        options?: { cause?: unknown }
    ) {
        const stderr = details.stderr?.trim() ?? '';
        super(stderr ? `${message}\n--- recognizer stderr ---\n${stderr}` : message, options);
        this.processExitCode = details.processExitCode ?? null;
        this.stderr = stderr;
        this.timedOut = details.timedOut ?? false;
    }
}

/** The recognizer finished but its output is missing or unusable. */
export class OutputParseError extends OmrError {
    readonly exitCode = 6;
}

export class WriteError extends OmrError {
    readonly exitCode = 7;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
