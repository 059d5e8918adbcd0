import { create } from "zustand";
import type {
  FailurePolicy,
  InstallationReport,
  OrchestratorEvent,
  OutcomeKind,
  RunStatus,
} from "./types.js";
import type { LogLevel } from "./logger.js";
import { outcomeMessage } from "./report.js";

export type StepStatus = "pending" | "running" | OutcomeKind;

export interface StepView {
  ordinal: number;
  name: string;
  policy: FailurePolicy;
  status: StepStatus;
  message?: string;
}

export interface LogLine {
  id: number;
  level: LogLevel;
  message: string;
}

export interface InstallerState {
  phase: RunStatus;
  steps: StepView[];
  logs: LogLine[];
  report: InstallationReport | null;
  failure: string | null;
}

interface Actions {
  setPlan: (steps: Array<{ name: string; policy: FailurePolicy }>) => void;
  applyEvent: (event: OrchestratorEvent) => void;
  appendLog: (level: LogLevel, message: string) => void;
  reset: () => void;
}

const MAX_LOG_LINES = 200;

const INITIAL_STATE: InstallerState = {
  phase: "pending",
  steps: [],
  logs: [],
  report: null,
  failure: null,
};

let nextLogId = 0;

function updateStep(steps: StepView[], ordinal: number, patch: Partial<StepView>): StepView[] {
  return steps.map((step) => (step.ordinal === ordinal ? { ...step, ...patch } : step));
}

export const useStore = create<InstallerState & Actions>((set) => ({
  ...INITIAL_STATE,

  setPlan: (steps) =>
    set({
      phase: "pending",
      steps: steps.map((step, index) => ({
        ordinal: index + 1,
        name: step.name,
        policy: step.policy,
        status: "pending",
      })),
      report: null,
      failure: null,
    }),

  applyEvent: (event) => {
    switch (event.type) {
      case "step-start":
        set((state) => ({
          phase: "running",
          steps: updateStep(state.steps, event.ordinal, { status: "running" }),
        }));
        return;
      case "step-finish":
        set((state) => ({
          steps: updateStep(state.steps, event.entry.ordinal, {
            status: event.entry.outcome.kind,
            message: outcomeMessage(event.entry.outcome),
          }),
        }));
        return;
      case "completed":
        set({ phase: "completed", report: event.report });
        return;
      case "aborted":
        set({ phase: "aborted", report: event.report, failure: event.error.message });
        return;
    }
  },

  appendLog: (level, message) =>
    set((state) => ({
      logs: [...state.logs, { id: nextLogId++, level, message }].slice(-MAX_LOG_LINES),
    })),

  reset: () => set({ ...INITIAL_STATE }),
}));
