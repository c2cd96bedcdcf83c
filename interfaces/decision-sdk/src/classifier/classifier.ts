export type ToolKind = "read" | "write";

export type ClassificationRule = "explicit_write" | "explicit_read" | "heuristic_write" | "default_read";

export type ToolClassification = {
  kind: ToolKind;
  write: boolean;
  read: boolean;
  rule: ClassificationRule;
  token: string | null;
};

export type ToolLists = {
  writeTools?: Iterable<string>;
  readTools?: Iterable<string>;
};

// Order matters: the first matching token is the one reported.
export const WRITE_TOKENS = [
  "create",
  "update",
  "delete",
  "send",
  "post",
  "put",
  "patch",
  "write",
  "set",
  "add",
  "remove"
] as const;

type ClassificationStep = (toolName: string, writeTools: Set<string>, readTools: Set<string>) => ToolClassification | null;

function classification(kind: ToolKind, rule: ClassificationRule, token: string | null = null): ToolClassification {
  return { kind, write: kind === "write", read: kind === "read", rule, token };
}

const CLASSIFICATION_STEPS: ClassificationStep[] = [
  (toolName, writeTools) => (writeTools.has(toolName) ? classification("write", "explicit_write") : null),
  (toolName, _writeTools, readTools) => (readTools.has(toolName) ? classification("read", "explicit_read") : null),
  (toolName) => {
    const lowered = toolName.toLowerCase();
    const token = WRITE_TOKENS.find((candidate) => lowered.includes(candidate));
    return token ? classification("write", "heuristic_write", token) : null;
  },
  () => classification("read", "default_read")
];

export function classifyTool(toolName: string, lists: ToolLists = {}): ToolClassification {
  const writeTools = new Set(lists.writeTools ?? []);
  const readTools = new Set(lists.readTools ?? []);
  for (const step of CLASSIFICATION_STEPS) {
    const result = step(toolName, writeTools, readTools);
    if (result) {
      return result;
    }
  }
  return classification("read", "default_read");
}

export function isWriteTool(toolName: string, lists: ToolLists = {}): boolean {
  return classifyTool(toolName, lists).write;
}

export function isReadTool(toolName: string, lists: ToolLists = {}): boolean {
  return !isWriteTool(toolName, lists);
}
