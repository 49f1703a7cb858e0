// Keep test output readable; set LOG_LEVEL explicitly to debug a failing test.
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";
