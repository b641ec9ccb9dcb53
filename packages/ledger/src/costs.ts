// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Credit-consuming actions known to the gate. */
export const ACTION_KINDS = [
  'email_classification',
  'email_draft_short',
  'email_draft_long',
  'sender_research_basic',
  'sender_research_deep',
  'workflow_execution',
  'follow_up_send',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type CostTable = Readonly<Record<ActionKind, number>>;

/** Credits charged per action.  Tunable through config, fixed per deployment. */
export const DEFAULT_ACTION_COSTS: CostTable = {
  email_classification: 1,
  email_draft_short: 3,
  email_draft_long: 7,
  sender_research_basic: 2,
  sender_research_deep: 5,
  workflow_execution: 2,
  follow_up_send: 1,
};

/** Drafts at or above this many characters are billed as long drafts. */
export const LONG_DRAFT_THRESHOLD_CHARS = 500;

export function isActionKind(value: unknown): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

/** Picks the draft action for a reply of the expected length. */
export function selectDraftAction(expectedLength: number): ActionKind {
  return expectedLength < LONG_DRAFT_THRESHOLD_CHARS ? 'email_draft_short' : 'email_draft_long';
}

/** Picks the research action for the requested depth. */
export function selectResearchAction(deep: boolean): ActionKind {
  return deep ? 'sender_research_deep' : 'sender_research_basic';
}

/** Default table with `overrides` applied; undefined entries keep their default. */
export function buildCostTable(overrides: Partial<Record<ActionKind, number>> = {}): CostTable {
  return {
    email_classification: overrides.email_classification ?? DEFAULT_ACTION_COSTS.email_classification,
    email_draft_short: overrides.email_draft_short ?? DEFAULT_ACTION_COSTS.email_draft_short,
    email_draft_long: overrides.email_draft_long ?? DEFAULT_ACTION_COSTS.email_draft_long,
    sender_research_basic: overrides.sender_research_basic ?? DEFAULT_ACTION_COSTS.sender_research_basic,
    sender_research_deep: overrides.sender_research_deep ?? DEFAULT_ACTION_COSTS.sender_research_deep,
    workflow_execution: overrides.workflow_execution ?? DEFAULT_ACTION_COSTS.workflow_execution,
    follow_up_send: overrides.follow_up_send ?? DEFAULT_ACTION_COSTS.follow_up_send,
  };
}
