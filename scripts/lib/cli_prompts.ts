import { confirm as confirmPrompt, select as selectPrompt } from '@inquirer/prompts';

import type { ConflictPolicy, LayoutStrategy, SnapshotOrigin } from './merge/types.js';

export interface SelectChoice<T> {
  name: string;
  value: T;
  description?: string;
}

export interface PromptAdapter {
  select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    defaultValue?: T;
  }): Promise<T>;
  confirm(options: {
    message: string;
    defaultValue?: boolean;
  }): Promise<boolean>;
}

export const interactivePromptAdapter: PromptAdapter = {
  async select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    defaultValue?: T;
  }): Promise<T> {
    return selectPrompt({
      message: options.message,
      choices: options.choices,
      default: options.defaultValue
    });
  },

  async confirm(options): Promise<boolean> {
    return confirmPrompt({
      message: options.message,
      default: options.defaultValue
    });
  }
};

const POLICY_CHOICES: Array<SelectChoice<ConflictPolicy>> = [
  {
    name: 'merge',
    value: 'merge',
    description: 'Keep translations, flag changed source text, add new keys'
  },
  {
    name: 'incremental',
    value: 'incremental',
    description: 'Only add keys the target does not have yet'
  },
  {
    name: 'rebuild',
    value: 'rebuild',
    description: 'Discard the target tree and write every key again'
  }
];

const STRATEGY_CHOICES: Array<SelectChoice<LayoutStrategy>> = [
  {
    name: 'mirror-reference',
    value: 'mirror-reference',
    description: 'Same files as the source-language tree'
  },
  {
    name: 'group-by-type',
    value: 'group-by-type',
    description: 'One file per definition type'
  },
  {
    name: 'mirror-source',
    value: 'mirror-source',
    description: 'Same files as the raw definition data'
  }
];

export async function choosePolicy(prompt: PromptAdapter, targetDir: string): Promise<ConflictPolicy> {
  return prompt.select({
    message: `${targetDir} already has translations. How should they be reconciled?`,
    choices: POLICY_CHOICES,
    defaultValue: 'merge'
  });
}

/** Only strategies the snapshot origin can satisfy are offered. */
export async function chooseStrategy(
  prompt: PromptAdapter,
  origin: SnapshotOrigin,
  defaultValue: LayoutStrategy
): Promise<LayoutStrategy> {
  const excluded: LayoutStrategy = origin === 'reference' ? 'mirror-source' : 'mirror-reference';
  return prompt.select({
    message: 'File layout for new entries:',
    choices: STRATEGY_CHOICES.filter((choice) => choice.value !== excluded),
    defaultValue
  });
}

export async function confirmRebuild(prompt: PromptAdapter, targetDir: string): Promise<boolean> {
  return prompt.confirm({
    message: `Rebuild deletes the existing files under ${targetDir}. Continue?`,
    defaultValue: false
  });
}
