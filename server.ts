import "dotenv/config";
import express from "express";
import cors from "cors";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

import { loadConfig } from "./src/config.js";
import { registerUsersTool } from "./src/tools/users.js";
import { registerDashboardTool } from "./src/tools/dashboard.js";
import { registerWeightTool } from "./src/tools/weight.js";
import { registerWorkoutLogTool } from "./src/tools/workout-log.js";
import { registerGoalsTool } from "./src/tools/goals.js";
import { registerAddRecordsTools } from "./src/tools/add-records.js";
import { registerWidgetResources } from "./src/resources/register-widgets.js";
import pool from "./src/db/connection.js";

const config = loadConfig();

const app = express();
app.use(cors({
  origin: config.allowedOrigins,
  methods: ["GET", "POST", "DELETE", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Mcp-Session-Id"],
}));
app.use(express.json({ limit: "1mb" }));

// Health check
app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

// New McpServer per request: the transport is stateless, so any request
// can be served without session affinity.
function createConfiguredServer(): McpServer {
  const server = new McpServer(
    { name: "fitness-dashboard", version: "1.0.0" },
    {
      instructions: `You help the user look at and record fitness data: body weight, workout sessions and goals.

Every view belongs to one user. If you do not know which user the person is, call list_users and ask them to pick one.

VIEWS — render the dashboard widget (do NOT repeat its data in text):
- show_dashboard: overview
- show_weight_tracking: weight history and trend
- show_workout_log: workout sessions and breakdowns
- show_goals: goal progress
- show_add_records: entry forms

DATA TOOLS — return JSON:
- list_users, log_weight, log_workout`,
    }
  );

  registerUsersTool(server);
  registerDashboardTool(server);
  registerWeightTool(server);
  registerWorkoutLogTool(server);
  registerGoalsTool(server);
  registerAddRecordsTools(server);
  registerWidgetResources(server, { distDir: config.widgetDistDir, nodeEnv: config.nodeEnv });

  return server;
}

// MCP endpoint
app.all("/mcp", async (req, res) => {
  try {
    const server = createConfiguredServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      transport.close().catch((err: unknown) => console.error("[mcp] Transport close error:", err));
      server.close().catch((err: unknown) => console.error("[mcp] Server close error:", err));
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  } catch (err) {
    console.error("MCP endpoint error:", err instanceof Error ? err.stack : err);
    if (!res.headersSent) {
      res.status(500).json({ error: "internal_error", message: "An unexpected error occurred" });
    }
  }
});

function start() {
  const httpServer = app.listen(config.port, () => {
    console.log(`Fitness Dashboard MCP server running on port ${config.port}`);
  });

  // Graceful shutdown handling
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Shutting down gracefully...`);
    httpServer.close(() => {
      console.log("HTTP server closed.");
      pool.end().then(
        () => {
          console.log("Database pool closed.");
          process.exit(0);
        },
        (err: unknown) => {
          console.error("Error closing database pool:", err);
          process.exit(1);
        },
      );
    });

    // Force close after 10 seconds
    setTimeout(() => {
      console.error("Forced shutdown after timeout.");
      process.exit(1);
    }, 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

start();
