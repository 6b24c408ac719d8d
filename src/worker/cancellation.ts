import { TaskCancelledError } from "../errors";

/** Advisory cancellation: operations check it between per-document steps. */
export class CancellationToken {
  private readonly controller = new AbortController();

  get cancelled() {
    return this.controller.signal.aborted;
  }

  /** For child processes, so a cancelled task does not wait on a hung converter. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel() {
    this.controller.abort();
  }

  throwIfCancelled() {
    if (this.cancelled) throw new TaskCancelledError();
  }

  static none(): CancellationToken {
    return new CancellationToken();
  }
}
