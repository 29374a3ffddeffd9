/**
 * Exits after a short delay so stdout/stderr can flush. LanceDB's native
 * threads can otherwise keep the process alive.
 */
export async function gracefulExit(code?: number) {
    await new Promise((resolve) => setTimeout(resolve, 250));
    process.exit(code ?? (typeof process.exitCode === "number" ? process.exitCode : 0));
}
