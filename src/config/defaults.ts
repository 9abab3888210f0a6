import type { AssemblerConfig } from "./types";

export const CONFIG_FILENAMES = [
  "casc-assembler.config.yaml",
  "casc-assembler.config.yml",
  "casc-assembler.config.json",
] as const;

/** Project list kept beside the tool config: `[git] repo_urls = [...]`. */
export const PROJECT_LIST_FILENAME = "jobs.toml";

export const DEFAULT_CONFIG: AssemblerConfig = {
  projectsDir: "projects",
  baseImage: {
    repositoryUrl: "https://github.com/cavcrosby/jenkins-docker-base",
  },
  repositories: [],
  patterns: {
    scriptSource: ".*job-dsl.*",
    baseDocument: "^.*casc.*\\.ya?ml$",
  },
  output: {
    lineWidth: 1000,
  },
  logging: {
    level: "info",
    destination: {
      type: "stderr",
    },
    enableTimestamps: true,
  },
};
