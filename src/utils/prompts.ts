// Small readline-based prompts: confirm, free text and numbered choice.

import { createInterface, type Interface } from "readline";
import { lightColors } from "./colors.js";

type Validator<T> = (input: T) => string | boolean;

export interface ConfirmOptions {
  message: string;
  default?: boolean;
}

export interface InputOptions {
  message: string;
  default?: string;
  validate?: Validator<string>;
}

export interface Choice<T> {
  name: string;
  value: T;
  short?: string;
}

export interface SelectOptions<T> {
  message: string;
  choices: Choice<T>[];
}

export class LightPrompts {
  private rl: Interface | null = null;

  async confirm(options: ConfirmOptions): Promise<boolean> {
    const defaultValue = options.default ?? false;
    const suffix = defaultValue ? " (Y/n)" : " (y/N)";

    return this.ask<boolean>(`${lightColors.cyan("?")} ${options.message}${suffix} `, answer => {
      const trimmed = answer.trim().toLowerCase();
      if (trimmed === "") return { value: defaultValue };
      if (trimmed === "y" || trimmed === "yes") return { value: true };
      if (trimmed === "n" || trimmed === "no") return { value: false };
      return { error: "Please answer with y/yes or n/no." };
    });
  }

  async input(options: InputOptions): Promise<string> {
    const defaultSuffix = options.default ? ` (${options.default})` : "";

    return this.ask<string>(`${lightColors.cyan("?")} ${options.message}${defaultSuffix} `, answer => {
      const value = answer.trim() || options.default || "";
      const validation = options.validate?.(value) ?? true;
      if (validation !== true) {
        return { error: typeof validation === "string" ? validation : "Invalid input" };
      }
      return { value };
    });
  }

  async select<T>(options: SelectOptions<T>): Promise<T> {
    const { choices } = options;
    console.log(`${lightColors.cyan("?")} ${options.message}`);
    choices.forEach((choice, index) => {
      console.log(`  ${lightColors.dim(`${index + 1})`)} ${choice.name}`);
    });

    return this.ask<T>(`${lightColors.cyan("  Answer:")} `, answer => {
      const trimmed = answer.trim();
      const byNumber = choices[Number.parseInt(trimmed, 10) - 1];
      const byName = choices.find(
        choice =>
          choice.name.toLowerCase() === trimmed.toLowerCase() ||
          choice.short?.toLowerCase() === trimmed.toLowerCase()
      );
      const selected = byNumber ?? byName;
      if (!selected) {
        return { error: `Please choose a number between 1-${choices.length} or enter the choice name.` };
      }
      return { value: selected.value };
    });
  }

  private async ask<T>(
    question: string,
    parse: (answer: string) => { value: T } | { error: string }
  ): Promise<T> {
    const rl = this.open();
    try {
      for (;;) {
        const answer = await new Promise<string>(resolve => rl.question(question, resolve));
        const result = parse(answer);
        if ("value" in result) {
          return result.value;
        }
        console.log(lightColors.red(result.error));
      }
    } finally {
      this.close();
    }
  }

  private open(): Interface {
    if (!this.rl) {
      this.rl = createInterface({ input: process.stdin, output: process.stdout, terminal: true });
    }
    return this.rl;
  }

  private close(): void {
    this.rl?.close();
    this.rl = null;
  }
}

const lightPrompts = new LightPrompts();

export const confirm = lightPrompts.confirm.bind(lightPrompts);
export const input = lightPrompts.input.bind(lightPrompts);
export const select = lightPrompts.select.bind(lightPrompts);
