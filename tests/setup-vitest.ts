// Keep test output quiet: stage tracing is opt-in and read once at import.
if (!process.env.ADCP_TRACE) {
  process.env.ADCP_TRACE = "0";
}

// Tests assert against the default pressure-to-depth factor.
delete process.env.ADCP_DBAR_TO_M;
