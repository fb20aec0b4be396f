import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { StructuredLogger } from "../../logger.js";
import { defineDirectTool } from "../directTool.js";
import type { DirectToolImplementation } from "../types.js";
import {
  failedResult,
  pathExists,
  type ProjectAccessConfig,
  resolveInProject,
  resolveProject,
  statusResult,
  toProjectPath,
} from "./projectAccess.js";

export const CREATE_FILE_TOOL_NAME = "create_new_file";

const CreateFileInputSchema = z.object({
  projectName: z.string().min(1),
  pathInProject: z.string().min(1),
  text: z.string(),
  overwrite: z.boolean().optional().default(false),
});

export function createNewFileTool(config: ProjectAccessConfig, logger: StructuredLogger): DirectToolImplementation {
  return defineDirectTool(
    Object.freeze({
      name: CREATE_FILE_TOOL_NAME,
      title: "Create New File",
      description: "Creates a new file in the specified project and path if conditions are met.",
      inputSchema: Object.freeze({
        type: "object" as const,
        properties: Object.freeze({
          projectName: { type: "string", description: "Name of the project" },
          pathInProject: { type: "string", description: "Path of the file relative to the project directory" },
          text: { type: "string", description: "Content of the file (e.g. source code or HTML)" },
          overwrite: { type: "boolean", description: "Whether an existing file may be overwritten" },
        }),
        required: Object.freeze(["projectName", "pathInProject", "text"]),
      }),
    }),
    CreateFileInputSchema,
    async (input) => {
      const project = await resolveProject(config, input.projectName, logger);
      if (!project.ok) {
        return failedResult(project.error);
      }
      const target = resolveInProject(project.projectDir, input.pathInProject);
      if (!target || target === project.projectDir) {
        logger.warn("project_path_traversal_denied", { path: input.pathInProject });
        return failedResult(`Path traversal detected in pathInProject: ${input.pathInProject}`);
      }
      const relative = toProjectPath(project.projectDir, target);
      if (!input.overwrite && (await pathExists(target))) {
        return failedResult(`File already exists and overwrite is not allowed: ${relative}`);
      }

      try {
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, input.text, "utf8");
      } catch (error) {
        logger.error("project_file_write_failed", {
          path: target,
          message: error instanceof Error ? error.message : String(error),
        });
        return failedResult(`Failed to write file '${relative}'`);
      }
      logger.info("project_file_written", { project: input.projectName, path: relative });
      return statusResult({ status: "success", message: `File written in project ${input.projectName}: ${relative}` });
    },
  );
}
