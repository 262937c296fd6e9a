declare module 'pino-roll' {
  interface PinoRollOptions {
    /** Target log file path */
    file: string;
    /** Size limit for rotation (e.g., '10m', '100k') */
    size?: string | number;
    /** Time-based rotation ('daily', 'hourly' or milliseconds) */
    frequency?: string | number;
    /** Retention limits */
    limit?: {
      /** Maximum number of rotated files to keep */
      count?: number;
    };
    /** Create the parent directory if missing */
    mkdir?: boolean;
    /** Extension appended after the rotation number */
    extension?: string;
  }

  interface RollStream {
    write(chunk: string): boolean;
    end(): void;
  }

  function pinoRoll(options: PinoRollOptions): Promise<RollStream>;
  export default pinoRoll;
}
