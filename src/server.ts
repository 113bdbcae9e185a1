import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DestinationLabelManager } from "./labels";
import {
  ExportTagsInputSchema,
  exportTags,
  ImportTagsInputSchema,
  importTags,
} from "./tools/backup";
import {
  AddDestinationInputSchema,
  addDestination,
  ExplainMatchInputSchema,
  explainMatch,
  GetDestinationInputSchema,
  getDestination,
  SearchDestinationsInputSchema,
  searchDestinations,
} from "./tools/destinations";
import {
  AddTagInputSchema,
  addTag,
  getTagsByCategory,
  SearchTagsInputSchema,
  searchTags,
  TagsByCategoryInputSchema,
} from "./tools/tags";
import { type Config, TAG_CATEGORIES } from "./types";

export const SERVER_NAME = "destination-labels-mcp";
export const SERVER_VERSION = "0.1.0";

function jsonContent(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorContent(text: string) {
  return {
    content: [{ type: "text" as const, text }],
    isError: true,
  };
}

/**
 * Create the MCP server and register every tool and resource against
 * `manager`. The caller connects a transport.
 */
export function createServer(
  manager: DestinationLabelManager,
  config: Config,
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Register Tag tools
  server.registerTool(
    "destinations_search_tags",
    {
      title: "Search Tags",
      description:
        "Find tags whose synonyms start with a prefix in one language, highest weight first",
      inputSchema: SearchTagsInputSchema.shape,
    },
    async (args) => jsonContent(searchTags(args, manager, config)),
  );

  server.registerTool(
    "destinations_tags_by_category",
    {
      title: "Tags by Category",
      description: `List all tags in a category (${TAG_CATEGORIES.join(", ")})`,
      inputSchema: TagsByCategoryInputSchema.shape,
    },
    async (args) => jsonContent(getTagsByCategory(args, manager, config)),
  );

  server.registerTool(
    "destinations_add_tag",
    {
      title: "Add Tag",
      description:
        "Add a multilingual tag, or replace the tag with the same ID (old synonyms stop matching)",
      inputSchema: AddTagInputSchema.shape,
    },
    async (args) => jsonContent(addTag(args, manager)),
  );

  // Register Destination tools
  server.registerTool(
    "destinations_search",
    {
      title: "Search Destinations",
      description:
        "Rank destinations against free-text tag queries. Scores combine query coverage (40%) and match quality (60%); exact synonym matches count double, so scores can exceed 1.0",
      inputSchema: SearchDestinationsInputSchema.shape,
    },
    async (args) => jsonContent(searchDestinations(args, manager, config)),
  );

  server.registerTool(
    "destinations_explain_match",
    {
      title: "Explain Match",
      description:
        "Show how a destination scores against tag queries, per query term",
      inputSchema: ExplainMatchInputSchema.shape,
    },
    async (args) => {
      const result = explainMatch(args, manager, config);
      if (!result) {
        return errorContent("Destination not found");
      }
      return jsonContent(result);
    },
  );

  server.registerTool(
    "destinations_add",
    {
      title: "Add Destination",
      description:
        "Add a destination with multilingual names and tag relevance scores, replacing any destination with the same ID",
      inputSchema: AddDestinationInputSchema.shape,
    },
    async (args) => jsonContent(addDestination(args, manager)),
  );

  server.registerTool(
    "destinations_get",
    {
      title: "Get Destination",
      description: "Get a destination by ID",
      inputSchema: GetDestinationInputSchema.shape,
    },
    async (args) => {
      const destination = getDestination(args, manager, config);
      if (!destination) {
        return errorContent("Destination not found");
      }
      return jsonContent(destination);
    },
  );

  // Register Backup tools
  server.registerTool(
    "destinations_export_tags",
    {
      title: "Export Tags",
      description: "Export all tags to a JSON file",
      inputSchema: ExportTagsInputSchema.shape,
    },
    async (args) => {
      const result = exportTags(args, manager);
      return { ...jsonContent(result), isError: !result.success };
    },
  );

  server.registerTool(
    "destinations_import_tags",
    {
      title: "Import Tags",
      description:
        "Import tags from a JSON export file, replacing tags with the same ID",
      inputSchema: ImportTagsInputSchema.shape,
    },
    async (args) => {
      const result = importTags(args, manager);
      return { ...jsonContent(result), isError: !result.success };
    },
  );

  // Register resources
  server.registerResource(
    "categories",
    "destinations://categories",
    {
      title: "Tag Categories",
      description: "All available tag categories",
      mimeType: "text/plain",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: TAG_CATEGORIES.map((category) => `- ${category}`).join("\n"),
        },
      ],
    }),
  );

  server.registerResource(
    "stats",
    "destinations://stats",
    {
      title: "Index Statistics",
      description: "Tag and destination counts with indexed languages",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: JSON.stringify(manager.getStats(), null, 2),
        },
      ],
    }),
  );

  return server;
}
