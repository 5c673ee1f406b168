import { spawn, SpawnOptions } from "node:child_process";
import { promises as fs, constants as fsConstants } from "node:fs";
import { EventEmitter } from "node:events";
import { Readable } from "node:stream";
import path from "node:path";
import {IRecognizer} from "../interfaces/recognizer.interface";
import {
    errorMessage,
    OutputParseError,
    RecognizerFailureError,
    RecognizerNotFoundError,
    WriteError,
} from "../types/errors";
import {Logger, logger as rootLogger} from "../utils/logger";

/** The part of a ChildProcess the recognizer relies on. */
export interface RecognizerProcess extends EventEmitter {
    readonly pid?: number;
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => RecognizerProcess;

export type AudiverisOptions = {
    executablePath?: string;    // Launcher binary or Audiveris JAR
    javaHome?: string;          // JDK used for the JAR and exported to the child as JAVA_HOME
    timeoutMs?: number;
    searchPaths?: string[];     // Checked before PATH when no executablePath is given
    extraArgs?: string[];       // Inserted before the image path
    env?: NodeJS.ProcessEnv;
    spawn?: SpawnFn;
    logger?: Logger;
};

export const DEFAULT_TIMEOUT_MS = 300_000;
export const STDERR_LIMIT = 4096;

export const DEFAULT_SEARCH_PATHS = [
    '/Applications/Audiveris.app/Contents/MacOS/Audiveris',
    '/usr/local/bin/audiveris',
    '/opt/audiveris/bin/Audiveris',
];

const PATH_NAMES = ['audiveris', 'Audiveris'];

type RunOutcome = {
    code: number | null;
    signal: NodeJS.Signals | null;
    stderr: string;
    timedOut: boolean;
};

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

const formatDuration = (ms: number) => ms < 1000 ? `${ms}ms` : `${Math.round(ms / 1000)}s`;

const isFile = (p: string, mode = fsConstants.F_OK) => fs.access(p, mode).then(() => true, () => false);

/**
 * Runs Audiveris in batch export mode:
 *   audiveris -batch -export -output <workingDir> <image>
 * and returns the .omr book it leaves in the working directory.
 */
export class AudiverisRecognizer implements IRecognizer {
    readonly name = 'audiveris';
    private executable: string | null = null;
    private readonly timeoutMs: number;
    private readonly spawnFn: SpawnFn;
    private readonly log: Logger;

    constructor(private readonly options: AudiverisOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.spawnFn = options.spawn ?? defaultSpawn;
        this.log = options.logger ?? rootLogger.child({ component: 'audiveris' });
    }

    isReady(): boolean { return this.executable !== null; }
    get executablePath(): string | null { return this.executable; }

    async initialize(): Promise<void> {
        const explicit = this.options.executablePath;
        if (explicit) {
            if (!(await isFile(explicit))) {
                throw new RecognizerNotFoundError(explicit);
            }
            this.executable = path.resolve(explicit);
        } else {
            const found = await this.findExecutable();
            if (!found) {
                throw new RecognizerNotFoundError();
            }
            this.executable = found;
        }
        this.log.debug('Audiveris resolved', { executable: this.executable });
    }

    private async findExecutable(): Promise<string | null> {
        for (const candidate of this.options.searchPaths ?? DEFAULT_SEARCH_PATHS) {
            if (await isFile(candidate)) return candidate;
        }
        const envPath = (this.options.env ?? process.env).PATH ?? '';
        for (const dir of envPath.split(path.delimiter).filter(Boolean)) {
            for (const name of PATH_NAMES) {
                const candidate = path.join(dir, name);
                if (await isFile(candidate, fsConstants.X_OK)) return candidate;
            }
        }
        return null;
    }

    commandFor(imagePath: string, workingDir: string): { command: string; args: string[] } {
        if (!this.executable) {
            throw new RecognizerNotFoundError(this.options.executablePath);
        }
        const args = ['-batch', '-export', '-output', workingDir, ...(this.options.extraArgs ?? []), imagePath];
        if (this.executable.toLowerCase().endsWith('.jar')) {
            const java = this.options.javaHome ? path.join(this.options.javaHome, 'bin', 'java') : 'java';
            return { command: java, args: ['-jar', this.executable, ...args] };
        }
        return { command: this.executable, args };
    }

    async recognize(imagePath: string, workingDir: string): Promise<string> {
        if (!this.isReady()) {
            await this.initialize();
        }

        try {
            await fs.mkdir(workingDir, { recursive: true });
        } catch (err) {
            throw new WriteError(`Cannot create working directory ${workingDir}: ${errorMessage(err)}`, { cause: err });
        }

        const { command, args } = this.commandFor(imagePath, workingDir);
        this.log.info('Running Audiveris', { image: imagePath, workingDir, timeoutMs: this.timeoutMs });
        this.log.debug('Audiveris command', { command, args });

        const started = Date.now();
        const outcome = await this.run(command, args);
        const elapsedMs = Date.now() - started;

        if (outcome.timedOut) {
            throw new RecognizerFailureError(
                `Audiveris timed out after ${formatDuration(this.timeoutMs)} and was killed`,
                { stderr: outcome.stderr, timedOut: true }
            );
        }
        if (outcome.code !== 0) {
            const reason = outcome.code === null ? `was terminated by ${outcome.signal ?? 'a signal'}` : `failed with exit code ${outcome.code}`;
            throw new RecognizerFailureError(`Audiveris ${reason}`, {
                processExitCode: outcome.code,
                stderr: outcome.stderr,
            });
        }
        this.log.debug('Audiveris finished', { elapsedMs });

        return this.locateOutput(imagePath, workingDir);
    }

    /**
     * The launcher runs in its own process group so a timeout kill also reaches
     * a JVM it forked. After a timeout the promise settles without waiting for
     * the pipes to close.
     */
    private run(command: string, args: string[]): Promise<RunOutcome> {
        return new Promise((resolve, reject) => {
            let child: RecognizerProcess;
            try {
                child = this.spawnFn(command, args, {
                    env: this.childEnv(),
                    stdio: ['ignore', 'pipe', 'pipe'],
                    detached: process.platform !== 'win32',
                });
            } catch (err) {
                reject(this.spawnFailure(err, command));
                return;
            }

            let stderr = '';
            let settled = false;

            const finish = (outcome: RunOutcome) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                resolve(outcome);
            };

            child.stderr?.setEncoding('utf8');
            child.stderr?.on('data', (chunk: string) => {
                stderr = (stderr + chunk).slice(-STDERR_LIMIT);
            });
            child.stdout?.setEncoding('utf8');
            child.stdout?.on('data', (chunk: string) => {
                const line = chunk.trim();
                if (line) this.log.debug(line, { stream: 'stdout' });
            });

            const timer = setTimeout(() => {
                this.log.warn('Audiveris timeout reached, killing process', { timeoutMs: this.timeoutMs });
                this.killTree(child);
                child.stdout?.destroy();
                child.stderr?.destroy();
                finish({ code: null, signal: 'SIGKILL', stderr, timedOut: true });
            }, this.timeoutMs);

            child.on('error', (err: Error) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                reject(this.spawnFailure(err, command));
            });
            child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
                finish({ code, signal, stderr, timedOut: false });
            });
        });
    }

    private killTree(child: RecognizerProcess): void {
        if (child.pid !== undefined && process.platform !== 'win32') {
            try {
                process.kill(-child.pid, 'SIGKILL');
                return;
            } catch (err) {
                this.log.debug('Process group kill failed, killing the launcher only', { error: errorMessage(err) });
            }
        }
        child.kill('SIGKILL');
    }

    private spawnFailure(err: unknown, command: string): Error {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            return new RecognizerNotFoundError(command, { cause: err });
        }
        return new RecognizerFailureError(`Cannot start Audiveris (${command}): ${errorMessage(err)}`, {}, { cause: err });
    }

    private childEnv(): NodeJS.ProcessEnv {
        const base = this.options.env ?? process.env;
        const javaHome = this.options.javaHome;
        if (!javaHome) return { ...base };
        return {
            ...base,
            JAVA_HOME: javaHome,
            PATH: [path.join(javaHome, 'bin'), base.PATH].filter(Boolean).join(path.delimiter),
        };
    }

    /** Audiveris names the book after the image stem, either flat or in a per-book folder. */
    private async locateOutput(imagePath: string, workingDir: string): Promise<string> {
        const stem = path.parse(imagePath).name;
        const candidates = [
            path.join(workingDir, `${stem}.omr`),
            path.join(workingDir, stem, `${stem}.omr`),
        ];
        for (const candidate of candidates) {
            if (await isFile(candidate)) {
                this.log.debug('Audiveris output located', { omr: candidate });
                return candidate;
            }
        }
        throw new OutputParseError(
            `Audiveris finished but produced no .omr book in ${workingDir} (looked for ${candidates.join(', ')})`
        );
    }
}
