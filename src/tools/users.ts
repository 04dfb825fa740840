import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { fetchUsers } from "../db/queries.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

export function registerUsersTool(server: McpServer) {
  server.registerTool(
    "list_users",
    {
      title: "List Users",
      description: `${APP_CONTEXT}List every user with id, username, email, age and height. Use the id as user_id for the show_* and log_* tools.`,
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("list_users", async () => {
      const users = await fetchUsers();
      return toolResponse({ users });
    }),
  );
}
