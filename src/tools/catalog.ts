import type { StructuredLogger } from "../logger.js";
import { createNewFileTool } from "./builtin/createNewFile.js";
import { createFindFilesByGlobTool } from "./builtin/findFilesByGlob.js";
import { createGlossaryTool, type Glossary } from "./builtin/glossary.js";
import type { ProjectAccessConfig } from "./builtin/projectAccess.js";
import { createReadTextFileTool } from "./builtin/readTextFile.js";
import type { DirectToolImplementation } from "./types.js";

/** Tool-set title selecting the built-in file tools. */
export const INTERNAL_TOOLS_TITLE = "internal_tools";
/** Tool-set title selecting the glossary tool. */
export const GLOSSARY_DEMO_TITLE = "glossary_tool_demo";

export interface BuiltinCatalogOptions {
  readonly projectAccess: ProjectAccessConfig;
  readonly glossary: Glossary | null;
  readonly glossaryDescription?: string;
  readonly logger: StructuredLogger;
}

/** Static tools available to sessions, independent of any live connection. */
export class BuiltinCatalog {
  private readonly fileTools: readonly DirectToolImplementation[];
  private readonly glossaryTool: DirectToolImplementation | null;
  private readonly projectAccess: ProjectAccessConfig;

  constructor(options: BuiltinCatalogOptions) {
    const { projectAccess, logger } = options;
    this.projectAccess = projectAccess;
    this.fileTools = Object.freeze([
      createNewFileTool(projectAccess, logger),
      createReadTextFileTool(projectAccess, logger),
      createFindFilesByGlobTool(projectAccess, logger),
    ]);
    this.glossaryTool = options.glossary
      ? createGlossaryTool(options.glossary, logger, options.glossaryDescription)
      : null;
  }

  /** The file tools are advertised only once a project directory is configured. */
  get internalToolsEnabled(): boolean {
    return this.projectAccess.projectDir !== null;
  }

  get glossaryEnabled(): boolean {
    return this.glossaryTool !== null;
  }

  /** Empty while no project directory is configured. */
  internalTools(): readonly DirectToolImplementation[] {
    return this.internalToolsEnabled ? this.fileTools : [];
  }

  glossary(): DirectToolImplementation | null {
    return this.glossaryTool;
  }
}
