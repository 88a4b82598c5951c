/**
 * Agent loop exports.
 */

export * from './loop-protocol.js';
export * from './loop-errors.js';
export { resolveInWorkdir, canonicalizePath, isWithinRoot } from './path-sandbox.js';
export { executeTool, getToolDefinitions, isToolName, TOOL_NAMES } from './loop-tools.js';
export { appendStory, readLedger, resolveLedgerPath, LEDGER_FILE } from './requirements-ledger.js';
export type { Story, LedgerDocument, NewStory } from './requirements-ledger.js';
export { InstructionStore, loadInstruction, saveInstruction } from './instruction-store.js';
export { ConsoleOperator, UnattendedOperator } from './operator-channel.js';
export type { OperatorChannel } from './operator-channel.js';
export { buildSystemPrompt, loadBasePrompt } from './loop-prompt.js';
export { prepareWorkspace, ensurePromptFiles } from './workspace-setup.js';
export type { PreparedWorkspace } from './workspace-setup.js';
export { runStep, createLlmDecide } from './step-engine.js';
export { runLoop, hasCompleted } from './loop-controller.js';
export { runAgentLoop } from './loop-runner.js';
export type { AgentLoopOptions } from './loop-runner.js';
