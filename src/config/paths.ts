import path from "node:path";

/** Fixed locations the tools read and write, relative to the project root. */
export function resolvePaths(projectRoot: string) {
  return {
    wpmInputDir: path.join(projectRoot, "wpm-measure"),
    wpmReportPath: path.join(projectRoot, "user-context", "wpm-analysis.json"),
    generatorConfigPath: path.join(projectRoot, "config.json"),
  };
}

export type ToolPaths = ReturnType<typeof resolvePaths>;
