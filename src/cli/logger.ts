export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}

let level = Verbosity.Normal;

export function setVerbosity(newLevel: Verbosity): void {
  level = newLevel;
}

/**
 * `-q` wins over any number of `-v`
 */
export function verbosityFromFlags(quiet: boolean | undefined, verboseCount: number | undefined): Verbosity {
  if (quiet) return Verbosity.Quiet;
  if ((verboseCount ?? 0) > 0) return Verbosity.Verbose;
  return Verbosity.Normal;
}

export const log = {
  /** Command output proper (rendered Makefiles, JSON); printed at every level */
  result(message: string): void {
    console.log(message);
  },
  info(message: string): void {
    if (level >= Verbosity.Normal) {
      console.log(message);
    }
  },
  warn(message: string): void {
    if (level >= Verbosity.Normal) {
      console.warn(message);
    }
  },
  error(message: string): void {
    console.error(message);
  },
  verbose(message: string): void {
    if (level >= Verbosity.Verbose) {
      console.log(message);
    }
  },
};
