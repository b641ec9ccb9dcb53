// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { MessageComposer, MessageSender } from '../collaborators.js';
import type { ScheduleEntry } from '../types.js';
import type { TaskContext, TaskHandler, TaskOf, TaskRunReport } from './handler.js';

export interface FollowUpTaskHandlerOptions {
  composer: MessageComposer;
  sender: MessageSender;
}

/** Composes and sends one follow-up.  Charged as `follow_up_send`. */
export class FollowUpTaskHandler implements TaskHandler<'follow_up'> {
  readonly kind = 'follow_up';
  readonly action = 'follow_up_send';
  readonly #options: FollowUpTaskHandlerOptions;

  constructor(options: FollowUpTaskHandlerOptions) {
    this.#options = options;
  }

  async run(task: TaskOf<'follow_up'>, entry: ScheduleEntry, context: TaskContext): Promise<TaskRunReport> {
    const message = await this.#options.composer.composeFollowUp({
      recipient: entry.recipient,
      emailId: task.emailId,
      followUpType: task.followUpType,
      ...(task.templateMessage !== undefined && { templateMessage: task.templateMessage }),
    });
    await this.#options.sender.send(message, context.signal);
    return { delivered: true, messages: 1 };
  }
}
