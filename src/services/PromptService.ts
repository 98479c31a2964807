import { confirm } from '@inquirer/prompts';
import type { UpdateCandidate } from '../deps/UpdateClassifier.ts';
import { SelectionSession } from '../selection/SelectionSession.ts';
import { upgradeSelectPrompt, type UpgradeSelectResult } from './UpgradeSelectPrompt.ts';

export interface PromptOptions {
  /** Cancels the prompt; it then rejects with an AbortPromptError */
  signal?: AbortSignal;
}

export interface PromptService {
  Confirm(
    message: string,
    options?: PromptOptions & { default?: boolean },
  ): Promise<boolean>;

  /**
   * Let the user pick which upgrades to apply.
   *
   * @returns The selection in list order, or undefined when the user quit
   */
  SelectUpgrades(
    message: string,
    candidates: readonly UpdateCandidate[],
    options?: PromptOptions,
  ): Promise<UpgradeSelectResult>;
}

/**
 * Default PromptService implementation powered by Inquirer.
 */
export class InquirerPromptService implements PromptService {
  public async Confirm(
    message: string,
    options: PromptOptions & { default?: boolean } = {},
  ): Promise<boolean> {
    return await confirm(
      { message, default: options.default },
      { signal: options.signal },
    );
  }

  public async SelectUpgrades(
    message: string,
    candidates: readonly UpdateCandidate[],
    options: PromptOptions = {},
  ): Promise<UpgradeSelectResult> {
    const session = new SelectionSession(candidates);
    return await upgradeSelectPrompt({ message, session }, { signal: options.signal });
  }
}
