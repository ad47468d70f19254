// Keep the JSON log lines on stderr out of test output.
process.env.GRAPH_REFACTOR_LOG_LEVEL = process.env.GRAPH_REFACTOR_LOG_LEVEL ?? "error";
