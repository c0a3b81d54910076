/**
 * assist-deploy engine -- Tool Registry
 *
 * Maps tool names to their implementations. This is the only place where
 * tools are registered.
 */

import { AssistantCliTool } from "./assistant-cli";
import { InstallableTool } from "./base-tool";

export { InstallableTool } from "./base-tool";
export type {
  ConfigureResult,
  ToolContext,
  ToolInstallOptions,
  ToolInstallResult,
  ToolUninstallResult,
  UninstallMethod,
} from "./base-tool";
export { AssistantCliTool } from "./assistant-cli";

export const DEFAULT_TOOL = "assistant-cli";

const tools: Map<string, InstallableTool> = new Map();

const assistantCli = new AssistantCliTool();
tools.set(assistantCli.name, assistantCli);

/**
 * @throws Error if no tool is registered under `name`
 */
export function getTool(name: string): InstallableTool {
  const tool = tools.get(name);
  if (!tool) {
    throw new Error(
      `Unknown tool "${name}". Supported tools: ${listTools().join(", ")}`,
    );
  }
  return tool;
}

export function listTools(): string[] {
  return Array.from(tools.keys());
}
