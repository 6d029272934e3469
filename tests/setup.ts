// Keep the suite independent of the developer's shell.
for (const key of Object.keys(process.env)) {
  if (key.startsWith('RST_BENCH_')) {
    delete process.env[key];
  }
}

process.env.RST_BENCH_LOG_LEVEL = 'silent';
