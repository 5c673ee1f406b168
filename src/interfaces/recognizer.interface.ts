/**
 * Boundary to the external OMR application. Implementations run the recognizer
 * on an image and return the path of the structured output it produced.
 *
 * recognize() rejects with RecognizerNotFoundError, RecognizerFailureError or,
 * when the recognizer produced no output file, OutputParseError.
 */
export interface IRecognizer {
    readonly name: string;
    isReady(): boolean;
    initialize(): Promise<void>;
    recognize(imagePath: string, workingDir: string): Promise<string>;
}
