// src/cli/report.ts

import { FEATURE_FLAGS, type FeatureFlag, type ProjectConfig } from "../schema";

export interface FileTreeNode {
  name: string;
  isFile: boolean;
  children: FileTreeNode[];
}

const FLAG_LABELS: Record<FeatureFlag, string> = {
  continuousIntegration: "CI",
  devcontainer: "Devcontainer",
  preCommitHooks: "Pre-commit",
  containerization: "Docker",
  diagrams: "Diagrams",
  localAiAssistant: "Continue",
};

const LABEL_WIDTH = 14;

export function formatConfigSummary(config: ProjectConfig): string[] {
  const rows: Array<[string, string]> = [
    ["Project", config.name],
    ["Description", config.description],
    ["Author", config.author],
    ["Python", config.runtimeVersion],
  ];

  for (const flag of FEATURE_FLAGS) {
    rows.push([FLAG_LABELS[flag], config[flag] ? "yes" : "no"]);
  }

  return rows.map(([label, value]) => `  ${label.padEnd(LABEL_WIDTH)}${value}`);
}

function compareNodes(a: FileTreeNode, b: FileTreeNode): number {
  // directories first, then by name
  if (a.isFile !== b.isFile) return a.isFile ? 1 : -1;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Build a nested tree from flat root-relative POSIX paths.
 */
export function buildFileTree(paths: readonly string[]): FileTreeNode[] {
  const root: FileTreeNode = { name: "", isFile: false, children: [] };

  for (const filePath of paths) {
    const parts = filePath.split("/").filter(Boolean);
    let current = root;
    parts.forEach((part, index) => {
      const isFile = index === parts.length - 1;
      let next = current.children.find((child) => child.name === part && child.isFile === isFile);
      if (!next) {
        next = { name: part, isFile, children: [] };
        current.children.push(next);
      }
      current = next;
    });
  }

  const sortRecursive = (node: FileTreeNode) => {
    node.children.sort(compareNodes);
    node.children.forEach(sortRecursive);
  };
  sortRecursive(root);

  return root.children;
}

export function renderFileTree(rootLabel: string, paths: readonly string[]): string[] {
  const lines = [`${rootLabel}/`];

  const walk = (nodes: FileTreeNode[], prefix: string) => {
    nodes.forEach((node, index) => {
      const last = index === nodes.length - 1;
      const label = node.isFile ? node.name : `${node.name}/`;
      lines.push(`${prefix}${last ? "└── " : "├── "}${label}`);
      if (!node.isFile) {
        walk(node.children, `${prefix}${last ? "    " : "│   "}`);
      }
    });
  };

  walk(buildFileTree(paths), "");
  return lines;
}

export function formatNextSteps(config: ProjectConfig): string[] {
  const steps: string[] = [];
  if (!config.useCurrentDirectory) {
    steps.push(`cd ${config.name}`);
  }
  steps.push("make setup");
  steps.push(`uv run python -m ${config.name}`);
  return steps;
}
