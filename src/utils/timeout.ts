/**
 * Race a promise against a timer.
 *
 * The timer is always cleared. If the timer wins, a later rejection of the
 * original promise is handed to onLateRejection instead of going unhandled.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error,
    onLateRejection: (error: unknown) => void = reportLateRejection
): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let timedOut = false;

    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            timedOut = true;
            reject(onTimeout());
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        clearTimeout(timer);
        if (timedOut) {
            promise.then(undefined, onLateRejection);
        }
    }
}

function reportLateRejection(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Abandoned operation failed after its timeout: ${message}`);
}
