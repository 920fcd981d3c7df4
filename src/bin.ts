#!/usr/bin/env node

// Import and start the CLI
import("./cli.js")
  .then(({ main }) => main())
  .catch((error) => {
    // This error occurs before logger is initialized, so console.error is appropriate
    console.error("Failed to start k3s-mcp-client:", error);
    process.exit(1);
  });
