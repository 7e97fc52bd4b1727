import readline from "node:readline";
import { Message } from "../../bot/message";
import { logger } from "../../logger";
import { BaseAdapter } from "../adapter";

export interface ShellAdapterConfig {
  /** Name replies are printed under. */
  nick?: string;
  /** Sender id given to every line typed. */
  user?: string;
  prompt?: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export const SHELL_CHANNEL = "shell";

/**
 * Line-oriented adapter for a terminal. Every non-empty line is a private
 * message addressed to the bot; replies are printed prefixed with the nick.
 */
export class ShellAdapter extends BaseAdapter {
  readonly id = "shell";

  private rl: readline.Interface | null = null;
  private readonly nick: string;
  private readonly user: string;
  private readonly prompt: string;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(config: ShellAdapterConfig = {}) {
    super();
    this.nick = config.nick ?? "minion";
    this.user = config.user ?? process.env.USER ?? "shell-user";
    this.prompt = config.prompt ?? "";
    this.input = config.input ?? process.stdin;
    this.output = config.output ?? process.stdout;
  }

  async connect(): Promise<void> {
    if (this.rl) {
      return;
    }
    this.setStatus("connecting");
    const rl = readline.createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => this.handleLine(line));
    rl.on("close", () => {
      this.rl = null;
      this.closeInbound();
      this.setStatus("disconnected");
      logger.info({ adapter: this.id }, "Shell input closed");
    });
    this.rl = rl;
    this.setStatus("connected");
    this.showPrompt();
  }

  async disconnect(): Promise<void> {
    this.rl?.close();
  }

  async send(message: Message): Promise<void> {
    const output = message.text
      .split("\n")
      .map((line) => `${this.nick}: ${line}`)
      .join("\n");
    this.output.write(`${output}\n`);
    this.showPrompt();
  }

  private handleLine(line: string): void {
    const text = line.trim();
    if (text) {
      this.emitMessage(
        new Message({
          channel: SHELL_CHANNEL,
          from: this.user,
          userId: this.user,
          private: true,
          toBot: true,
          text,
        }),
      );
    }
    this.showPrompt();
  }

  private showPrompt(): void {
    if (this.rl && this.prompt) {
      this.output.write(this.prompt);
    }
  }
}
