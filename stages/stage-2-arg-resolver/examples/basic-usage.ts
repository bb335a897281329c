/**
 * Stage 2 Argument Resolver 基础用法：
 * - 用 Stage 1 Tool Catalog 声明每个工具的必填 / 可选参数
 * - resolveWithDiagnostics：显式参数 → context → 扁平化 context → 角色表 → 默认值 → 别名
 * - tryResolve：缺参时返回 MissingRequiredArgumentError（不抛异常），列出全部缺失参数
 * - profile 对象会被压缩成一行摘要；college 找不到时兜底为 "this college"
 */

import { createConsoleLogger } from "../../stage-0-runtime/src/index.js";
import { createToolCatalog } from "../../stage-1-tool-catalog/src/index.js";
import { createArgResolver, createMemoryStore } from "../src/index.js";

const catalog = createToolCatalog([
  {
    name: "outline",
    requiredParams: ["story", "essay_prompt"],
    optionalParams: ["word_count", "tone"],
  },
  { name: "revise", requiredParams: ["text"], optionalParams: ["voice_profile"] },
  { name: "shortlist", requiredParams: ["college", "deadline"], optionalParams: [] },
  { name: "suggest_stories", requiredParams: ["profile", "college"], optionalParams: [] },
]);

const memory = createMemoryStore({
  essay_prompt: "Describe a challenge you overcame.",
  tone: "warm",
});

const resolver = createArgResolver({
  catalog,
  memory,
  logger: createConsoleLogger("debug"),
});

// 上一步工具输出已经合并进 working context
const context = {
  brainstorm_specific: { best_idea: "Rebuilding the robotics club after a flood" },
  draft: { draft: "When the water receded, our workshop was gone..." },
  preferences: { preferred_word_count: 500 },
  user_profile: {
    user_info: { name: "Mia", intended_major: "Civil Engineering" },
    core_values: [{ value: "resilience" }, { value: "teamwork" }],
  },
};

function main(): void {
  console.log("=== outline ===");
  const outline = resolver.resolveWithDiagnostics({
    toolName: "outline",
    context,
    runId: "example",
  });
  console.log("args:", outline.args);
  console.log("sources:", outline.sources);

  console.log("\n=== revise (explicit args win) ===");
  console.log(
    resolver.resolve({
      toolName: "revise",
      explicitArgs: { text: "A shorter opening." },
      context,
    })
  );

  console.log("\n=== suggest_stories (profile summary + fallback) ===");
  console.log(resolver.resolveWithDiagnostics({ toolName: "suggest_stories", context }));

  console.log("\n=== shortlist (missing args) ===");
  const result = resolver.tryResolve({ toolName: "shortlist", context });
  if (!result.ok) {
    console.log(result.error.message);
    console.log("missing:", result.error.missing);
  }
}

main();
