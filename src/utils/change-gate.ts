import { createInterface } from 'readline/promises';

export type ChangeMode = 'execute' | 'whatif' | 'confirm';

/**
 * Sits in front of every state-mutating step (copy, restore, drop, create).
 * Returns false when the step must not run.
 */
export interface ChangeGate {
  shouldProcess(target: string, action: string): Promise<boolean>;
}

export function whatIfMessage(target: string, action: string): string {
  return `What if: Performing the operation "${action}" on target "${target}".`;
}

export const executeGate: ChangeGate = {
  async shouldProcess() {
    return true;
  },
};

export function createWhatIfGate(print: (line: string) => void = console.log): ChangeGate {
  return {
    async shouldProcess(target: string, action: string) {
      print(whatIfMessage(target, action));
      return false;
    },
  };
}

/**
 * Prompt on the terminal before each step. "a" answers yes to every remaining step.
 */
export function createConfirmGate(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ChangeGate {
  let yesToAll = false;

  return {
    async shouldProcess(target: string, action: string) {
      if (yesToAll) return true;

      const rl = createInterface({ input, output });
      try {
        const answer = await rl.question(
          `Are you sure you want to perform "${action}" on target "${target}"? [y]es / [a]ll / [n]o: `
        );
        const normalized = answer.trim().toLowerCase();
        if (normalized === 'a' || normalized === 'all') {
          yesToAll = true;
          return true;
        }
        return normalized === 'y' || normalized === 'yes';
      } finally {
        rl.close();
      }
    },
  };
}

export function createChangeGate(mode: ChangeMode): ChangeGate {
  switch (mode) {
    case 'execute':
      return executeGate;
    case 'whatif':
      return createWhatIfGate();
    case 'confirm':
      return createConfirmGate();
    default:
      throw new Error(`Unsupported change mode: ${mode satisfies never}`);
  }
}
