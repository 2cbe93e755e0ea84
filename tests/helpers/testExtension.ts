import { createDataPacket } from "../../server/engine/dataPacket.js";
import type { EngineExtension } from "../../server/engine/registry.js";
import type { ToolResult } from "../../server/types.js";

export interface FeedItem {
  id: string;
  title: string;
  body?: string;
}

export interface TestExtensionOptions {
  feedItems?: FeedItem[];
  publishResult?: ToolResult;
  failFetchWith?: Error;
}

export const PUBLISH_TOOL_NAME = "publish_post";
export const SEARCH_TOOL_NAME = "web_search";

/**
 * A fetch handler that emits one unprocessed feed item per job, a publish
 * handler that also exposes a handler tool, and a global search tool.
 */
export function createTestExtension(options: TestExtensionOptions = {}): {
  extension: EngineExtension;
  published: Array<Record<string, unknown>>;
  searches: Array<Record<string, unknown>>;
} {
  const published: Array<Record<string, unknown>> = [];
  const searches: Array<Record<string, unknown>> = [];
  const feedItems = options.feedItems ?? [];

  const extension: EngineExtension = {
    name: "test-handlers",
    register: (registry) => {
      registry.registerHandler({
        slug: "test_feed",
        stepType: "fetch",
        fetch: async ({ gate, mergeEngineData }) => {
          if (options.failFetchWith) {
            throw options.failFetchWith;
          }
          const item = feedItems.find((entry) => !gate.isProcessed("test_feed", entry.id));
          if (!item) {
            return [];
          }
          gate.claim("test_feed", item.id);
          mergeEngineData({ source_url: `https://example.test/items/${item.id}` });
          return [
            createDataPacket({
              title: item.title,
              body: item.body ?? "",
              metadata: { source_type: "test_feed", item_identifier: item.id }
            })
          ];
        }
      });

      registry.registerHandler({
        slug: "test_publisher",
        stepType: "publish",
        execute: async ({ parameters }) => {
          published.push({ via: "step", ...parameters });
          return options.publishResult ?? { success: true, post_id: "post-direct" };
        },
        tools: () => [
          {
            declaration: {
              name: PUBLISH_TOOL_NAME,
              description: "Publish the finished post",
              parameters: {
                type: "object",
                properties: { title: { type: "string" }, content: { type: "string" } },
                required: ["title", "content"]
              }
            },
            binding: "test_publisher.publish"
          }
        ]
      });

      registry.registerToolImplementation("test_publisher.publish", ({ parameters }) => {
        published.push({ via: "tool", ...parameters });
        return options.publishResult ?? { success: true, post_id: "post-1" };
      });

      registry.registerGlobalTool({
        declaration: {
          name: SEARCH_TOOL_NAME,
          description: "Search the web",
          parameters: { type: "object", properties: { query: { type: "string" } }, required: ["query"] }
        },
        binding: "web_search"
      });

      registry.registerToolImplementation("web_search", ({ parameters }) => {
        searches.push(parameters);
        return { success: true, results: [`result for ${String(parameters.query)}`] };
      });
    }
  };

  return { extension, published, searches };
}
