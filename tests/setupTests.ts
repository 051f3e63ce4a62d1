// Shell overrides must not leak into tests; each test builds its own config.
for (const key of Object.keys(process.env)) {
    if (key.startsWith('LEDGER_')) delete process.env[key];
}
process.env.LOG_LEVEL = 'silent';
