export function isTestEnv() {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === "test");
}

export function envInt(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
    const raw = env[name];
    if (raw == null || raw.trim() === "") return undefined;
    const n = Number(raw);
    return Number.isInteger(n) ? n : undefined;
}

export function envFlag(name: string, env: NodeJS.ProcessEnv = process.env): boolean | undefined {
    const raw = env[name];
    if (raw == null || raw.trim() === "") return undefined;
    return raw === "1" || raw.toLowerCase() === "true";
}
