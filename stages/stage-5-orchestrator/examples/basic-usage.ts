/**
 * Stage 5 Orchestrator 基础用法：
 * - 从 .env 读取引擎配置（loadEngineConfig），日志级别与 AGENT_SHOW_ARGS 决定输出
 * - 进程内的假工具 + 简单的 re-planning oracle 桩；质量评分走本地启发式（无 evaluator）
 * - run(planHint, userInput, context)：执行、重试、质量纠正、重新规划，返回 History
 * - runStore 记录每次 run 的状态迁移，便于审计
 */

import {
  createEngineLogger,
  loadEngineConfig,
  toOrchestratorOptions,
} from "../../../config/index.js";
import {
  buildToolCatalog,
  createToolRegistry,
  type Tool,
} from "../../stage-1-tool-catalog/src/index.js";
import { createMemoryStore } from "../../stage-2-arg-resolver/src/index.js";
import {
  createOrchestrator,
  createRunStore,
  type ReplanningOracle,
} from "../src/index.js";

// ---------- 工具定义 ----------

const brainstormTool: Tool<{ essay_prompt: string }, { best_idea: string }> = {
  name: "brainstorm_specific",
  description: "Suggest one concrete story for the essay prompt.",
  parameters: {
    type: "object",
    properties: { essay_prompt: { type: "string" } },
    required: ["essay_prompt"],
  },
  async execute(args) {
    return { best_idea: `A time I failed at: ${args.essay_prompt.toLowerCase()}` };
  },
};

const draftTool: Tool<{ story: string; word_count?: number }, { draft: string }> = {
  name: "draft",
  description: "Write a first draft from a story idea.",
  parameters: {
    type: "object",
    properties: {
      story: { type: "string" },
      word_count: { type: "number" },
    },
    required: ["story"],
  },
  // 必须先有 brainstorm 的结果
  dependencies: ["brainstorm_specific"],
  async execute(args) {
    return { draft: `${args.story}. It was hard. It was hard. It was hard.` };
  },
};

const reviseTool: Tool<{ text: string; target_quality: number }, { revised_draft: string }> = {
  name: "revise_for_clarity",
  description: "Rewrite the current draft for clarity.",
  parameters: {
    type: "object",
    properties: {
      text: { type: "string" },
      target_quality: { type: "number" },
    },
    required: ["text"],
  },
  async execute(args) {
    return {
      revised_draft: `${args.text.split(".")[0]}. The flood took our workshop, so we rebuilt every robot from salvaged parts and learned to plan for the worst while still hoping for the best outcome each season.`,
    };
  },
};

const chatTool: Tool<{ prompt: string }, string> = {
  name: "chat_response",
  description: "Answer conversationally.",
  parameters: {
    type: "object",
    properties: { prompt: { type: "string" } },
    required: ["prompt"],
  },
  async execute(args) {
    return `You said: ${args.prompt}`;
  },
};

// ---------- Oracle 桩：依次推荐 brainstorm → draft，之后结束 ----------

const oracle: ReplanningOracle = {
  decideNext(userInput, context) {
    if (userInput === "Improve quality") {
      return { kind: "execute_one", toolName: "revise_for_clarity" };
    }
    if (!("draft" in context)) {
      return {
        kind: "execute_one",
        toolName: "draft",
        rationale: "A story exists; write the first draft.",
        confidence: 0.8,
      };
    }
    return { kind: "conversational_fallback" };
  },
};

async function main(): Promise<void> {
  const config = loadEngineConfig();
  const registry = createToolRegistry();
  for (const tool of [brainstormTool, draftTool, reviseTool, chatTool]) {
    registry.register(tool);
  }
  const runStore = createRunStore();

  const orchestrator = createOrchestrator(
    {
      catalog: buildToolCatalog(registry.list()),
      tools: registry,
      oracle,
      memory: createMemoryStore({ essay_prompt: "Describe a setback" }),
      logger: createEngineLogger(config),
      runStore,
    },
    { ...toOrchestratorOptions(config), userId: "demo-user" }
  );

  const result = await orchestrator.run(
    { action: "tool_execution", tool_name: "brainstorm_specific" },
    "Help me start my essay",
    { preferences: { preferred_word_count: 250 } }
  );

  console.log("\n=== History ===");
  for (const step of result.steps) {
    const score = step.qualityScore ? ` score=${step.qualityScore.score}` : "";
    console.log(
      `#${step.index} ${step.toolName} [${step.origin}] ok=${step.result.ok} attempts=${step.attempts}${score}`
    );
  }
  console.log(`\nstatus=${result.status} stopReason=${result.stopReason}`);

  const snapshot = runStore.get(result.runId);
  console.log(
    "transitions:",
    snapshot?.transitions.map((t) => `${t.from}->${t.to}`).join(", ")
  );
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
