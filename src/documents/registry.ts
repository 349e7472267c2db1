/** A per-goal planning document such as strategies.md. */
export interface GoalDocumentKind {
  /** CLI command name. */
  command: string;
  fileName: string;
  /** Bundled template name / project override `<template>-template.md`. */
  template: string;
  /** Human label used in messages and commit subjects. */
  label: string;
  description: string;
  /** JSON key for the document path. */
  jsonKey: string;
  includeBranch: boolean;
  /** Refuse to run when the goal has no goal.md yet. */
  requiresGoalFile: boolean;
}

export const GOAL_DOCUMENT_KINDS: readonly GoalDocumentKind[] = [
  {
    command: "strategies",
    fileName: "strategies.md",
    template: "strategies",
    label: "strategy analysis",
    description: "Explore implementation strategies for a goal",
    jsonKey: "STRATEGY_FILE",
    includeBranch: true,
    requiresGoalFile: false,
  },
  {
    command: "milestones",
    fileName: "milestones.md",
    template: "milestones",
    label: "milestone plan",
    description: "Plan measurable milestones for a goal",
    jsonKey: "MILESTONE_FILE",
    includeBranch: true,
    requiresGoalFile: false,
  },
  {
    command: "execution",
    fileName: "execution.md",
    template: "execution",
    label: "execution plan",
    description: "Create the execution plan for a goal",
    jsonKey: "EXECUTION_FILE",
    includeBranch: true,
    requiresGoalFile: false,
  },
  {
    command: "metrics",
    fileName: "metrics.md",
    template: "metrics",
    label: "metrics plan",
    description: "Define success metrics for a goal",
    jsonKey: "METRICS_FILE",
    includeBranch: true,
    requiresGoalFile: false,
  },
  {
    command: "risk-register",
    fileName: "risk-register.md",
    template: "risk-register",
    label: "risk register",
    description: "Create a risk register for a goal",
    jsonKey: "RISK_REGISTER_FILE",
    includeBranch: false,
    requiresGoalFile: false,
  },
  {
    command: "quality-assurance",
    fileName: "quality-assurance.md",
    template: "quality-assurance",
    label: "quality assurance plan",
    description: "Create a quality assurance plan for a goal",
    jsonKey: "QA_FILE",
    includeBranch: false,
    requiresGoalFile: false,
  },
  {
    command: "security-review",
    fileName: "security-review.md",
    template: "security-review",
    label: "security review",
    description: "Create a security review checklist for a goal",
    jsonKey: "SECURITY_REVIEW_FILE",
    includeBranch: false,
    requiresGoalFile: false,
  },
  {
    command: "compliance",
    fileName: "compliance-checklist.md",
    template: "compliance-checklist",
    label: "compliance checklist",
    description: "Create a compliance checklist for a goal",
    jsonKey: "COMPLIANCE_FILE",
    includeBranch: false,
    requiresGoalFile: false,
  },
  {
    command: "retrospective",
    fileName: "retrospective.md",
    template: "retrospective",
    label: "retrospective",
    description: "Create a detailed retrospective for a goal",
    jsonKey: "RETROSPECTIVE_FILE",
    includeBranch: false,
    requiresGoalFile: false,
  },
  {
    command: "tasks",
    fileName: "tasks.md",
    template: "tasks",
    label: "implementation tasks",
    description: "Break a goal down into implementation tasks",
    jsonKey: "TASKS_FILE",
    includeBranch: false,
    requiresGoalFile: true,
  },
];

export function findGoalDocumentKind(command: string): GoalDocumentKind | undefined {
  return GOAL_DOCUMENT_KINDS.find((k) => k.command === command);
}
