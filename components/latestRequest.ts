export type RequestTracker = {
  /** Starts a request and returns its ticket. */
  begin: () => number;
  isLatest: (ticket: number) => boolean;
};

/** Lets a form drop responses that a newer request has overtaken. */
export function createRequestTracker(): RequestTracker {
  let latest = 0;
  return {
    begin: () => {
      latest += 1;
      return latest;
    },
    isLatest: (ticket) => ticket === latest,
  };
}
