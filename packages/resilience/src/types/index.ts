export type AttemptContext = {
  resource: string;
  /** 1-indexed attempt number within one execution */
  attempt: number;
  /** Aborted when the attempt times out or the execution is cancelled */
  signal: AbortSignal;
};

/** The caller's unit of work; may run several times per execution */
export type Operation<T> = (context: AttemptContext) => Promise<T>;

export type FallbackContext = {
  resource: string;
  /** Attempts made before giving up (0 when the call was never admitted) */
  attempts: number;
};

/** Substitute result when the primary path is exhausted */
export type Fallback<F> = (error: Error, context: FallbackContext) => Promise<F> | F;
