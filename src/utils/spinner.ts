import { lightColors } from "./colors.js";

type SpinnerColor = "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "white" | "gray";

export interface SpinnerOptions {
  text?: string;
  color?: SpinnerColor;
  interval?: number;
  stream?: NodeJS.WriteStream;
}

const UNICODE_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const ASCII_FRAMES = ["|", "/", "-", "\\"];

export class LightSpinner {
  private text: string;
  private readonly color: SpinnerColor;
  private readonly interval: number;
  private readonly stream: NodeJS.WriteStream;
  private readonly frames: string[];
  private currentFrame = 0;
  private timer?: ReturnType<typeof setInterval>;
  private lastLength = 0;

  constructor(options: SpinnerOptions | string = {}) {
    const resolved = typeof options === "string" ? { text: options } : options;

    this.text = resolved.text ?? "";
    this.color = resolved.color ?? "cyan";
    this.interval = resolved.interval ?? 80;
    this.stream = resolved.stream ?? process.stderr;
    this.frames = this.stream.isTTY && !process.env.CI ? UNICODE_FRAMES : ASCII_FRAMES;
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  set message(text: string) {
    this.text = text;
    if (!this.stream.isTTY && text) {
      this.stream.write(`${text}\n`);
    }
  }

  get message(): string {
    return this.text;
  }

  start(text?: string): this {
    if (text) {
      this.text = text;
    }
    if (this.isRunning) {
      return this;
    }
    if (!this.stream.isTTY) {
      if (this.text) {
        this.stream.write(`${this.text}\n`);
      }
      return this;
    }

    this.currentFrame = 0;
    this.stream.write("\u001B[?25l");
    this.render();
    this.timer = setInterval(() => this.render(), this.interval);
    return this;
  }

  stop(): this {
    if (!this.timer) {
      return this;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.clear();
    this.stream.write("\u001B[?25h");
    return this;
  }

  succeed(text?: string): this {
    return this.finish(lightColors.green("✓"), text);
  }

  fail(text?: string): this {
    return this.finish(lightColors.red("✗"), text);
  }

  warn(text?: string): this {
    return this.finish(lightColors.yellow("⚠"), text);
  }

  private finish(symbol: string, text?: string): this {
    this.stop();
    const message = text ?? this.text;
    if (message) {
      this.stream.write(`${symbol} ${message}\n`);
    }
    return this;
  }

  private render(): void {
    const frame = this.frames[this.currentFrame] ?? "";
    const line = `${lightColors[this.color](frame)} ${this.text}`;

    this.clear();
    this.stream.write(line);
    this.lastLength = lightColors.strip(line).length;
    this.currentFrame = (this.currentFrame + 1) % this.frames.length;
  }

  private clear(): void {
    if (this.lastLength > 0) {
      this.stream.write(`\r${" ".repeat(this.lastLength)}\r`);
    }
  }
}

export const lightSpinner = (options?: SpinnerOptions | string): LightSpinner =>
  new LightSpinner(options);

