import chalk from "chalk";
import * as readline from "readline";
import {
  AlternateProviderProfile,
  GLM_PROFILE,
} from "../../domain/provider/entities/provider";
import { ConfigStorePort } from "../../ports/outbound/config-store.port";
import {
  SuppliedToken,
  TokenSupplierPort,
} from "../../ports/outbound/token-supplier.port";
import { describeError, EmptyTokenError } from "../../shared/errors";
import { logger } from "../../utils/logger";

export interface InteractiveTokenSupplierOptions {
  store: Pick<ConfigStorePort, "loadToken" | "saveToken">;
  profile?: AlternateProviderProfile;
  env?: NodeJS.ProcessEnv;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

interface LinePrompter {
  ask(question: string): Promise<string>;
  close(): void;
}

// Lines that arrive before a question is asked are buffered, so piped
// input answers both prompts.
function createLinePrompter(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): LinePrompter {
  const rl = readline.createInterface({ input, output, terminal: false });
  const buffered: string[] = [];
  const waiting: Array<(line: string) => void> = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      buffered.push(line);
    }
  }).on("close", () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve("");
    }
  });

  return {
    ask(question: string): Promise<string> {
      output.write(question);
      const line = buffered.shift();
      if (line !== undefined) {
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.resolve("");
      }
      return new Promise((resolve) => waiting.push(resolve));
    },
    close(): void {
      rl.close();
    },
  };
}

export class InteractiveTokenSupplierAdapter implements TokenSupplierPort {
  private readonly store: Pick<ConfigStorePort, "loadToken" | "saveToken">;
  private readonly profile: AlternateProviderProfile;
  private readonly env: NodeJS.ProcessEnv;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: InteractiveTokenSupplierOptions) {
    this.store = options.store;
    this.profile = options.profile ?? GLM_PROFILE;
    this.env = options.env ?? process.env;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async supplyToken(): Promise<SuppliedToken> {
    for (const envVar of this.profile.tokenEnvVars) {
      const token = this.env[envVar]?.trim();
      if (token) {
        return { token, source: "env", envVar };
      }
    }

    const saved = await this.store.loadToken();
    if (saved) {
      return { token: saved, source: "saved" };
    }

    return this.promptForToken();
  }

  private async promptForToken(): Promise<SuppliedToken> {
    const prompter = createLinePrompter(this.input, this.output);
    try {
      this.output.write(`${chalk.yellow("No API token found")}\n\n`);
      this.output.write(
        `${chalk.cyan(`Please enter your ${this.profile.displayName} API token:`)}\n`,
      );
      const token = (await prompter.ask("> ")).trim();
      if (!token) {
        throw new EmptyTokenError();
      }

      this.output.write(`\n${chalk.cyan("Save token for future use? (y/n)")}\n`);
      const answer = (await prompter.ask("> ")).trim().toLowerCase();
      if (answer === "y" || answer === "yes") {
        await this.persistToken(token);
      }

      return { token, source: "prompt" };
    } finally {
      prompter.close();
    }
  }

  private async persistToken(token: string): Promise<void> {
    try {
      await this.store.saveToken(token);
      this.output.write(`${chalk.green("Token saved successfully")}\n`);
    } catch (error) {
      const message = describeError(error);
      this.output.write(`${chalk.yellow(`Failed to save token: ${message}`)}\n`);
      await logger.warn(`Failed to save token: ${message}`);
    }
  }
}
