import { Command, Option } from "clipanion";
import pino from "pino";
import type { Writable } from "node:stream";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import type { MembershipProbe, Requester } from "../../budget/access.js";
import { periodSuffix } from "../../budget/gate.js";
import { createUsageService, type UsageService } from "../../budget/service.js";
import type { UsageEvent } from "../../usage/types.js";

function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function openService(): UsageService {
  const config = loadConfig();
  // stdout carries command output, logs go to stderr
  const logger = createLogger(
    { level: config.logging?.level ?? "warn" },
    pino.destination({ dest: 2, sync: true }),
  );
  return createUsageService(config, logger);
}

function fail(stdout: Writable, err: unknown): void {
  stdout.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
}

export class UsageShowCommand extends Command {
  static override paths = [["usage", "show"]];

  static override usage = Command.Usage({
    description: "Show today's and this month's usage for an identity",
    examples: [
      ["Show a user's usage", "tokentab usage show 123456789"],
      ["Show the guest pool", "tokentab usage show guests"],
    ],
  });

  identity = Option.String({ name: "identity", required: true });
  name = Option.String("--name", { description: "Display name for a new ledger" });

  async execute(): Promise<void> {
    let service: UsageService;
    try {
      service = openService();
    } catch (err) {
      fail(this.context.stdout, err);
      return;
    }

    const report = await service.report({
      userId: this.identity,
      displayName: this.name ?? this.identity,
      chatType: "dm",
    });
    const t = report.transcription;
    const out = this.context.stdout;
    out.write(`Usage for ${report.displayName} (${report.identity}) on ${report.date}\n`);
    out.write(
      `Today:       ${report.chatTokens.today} chat tokens, ${report.images.today} images, ` +
        `${t.minutesToday} min ${t.secondsToday} s transcribed, ${formatUsd(report.cost.costToday)}\n`,
    );
    out.write(
      `This month:  ${report.chatTokens.month} chat tokens, ${report.images.month} images, ` +
        `${t.minutesMonth} min ${t.secondsMonth} s transcribed, ${formatUsd(report.cost.costMonth)}\n`,
    );
    out.write(`All time:    ${formatUsd(report.cost.costAllTime)}\n`);
    if (Number.isFinite(report.remainingBudget)) {
      out.write(
        `Remaining:   ${formatUsd(report.remainingBudget)}${periodSuffix(service.gate.period)}\n`,
      );
    } else {
      out.write(`Remaining:   unlimited\n`);
    }
  }
}

export class UsageBudgetCommand extends Command {
  static override paths = [["usage", "budget"]];

  static override usage = Command.Usage({
    description: "Show which allowance applies to a user and what is left of it",
    examples: [
      ["Check a user", "tokentab usage budget 123456789"],
      [
        "Check a guest writing in a group with an allowed member",
        "tokentab usage budget 987654321 --group --members 123456789,555",
      ],
    ],
  });

  identity = Option.String({ name: "identity", required: true });
  group = Option.Boolean("--group", false, { description: "Evaluate as a group chat message" });
  members = Option.String("--members", {
    description: "Comma-separated ids of the group chat's members",
  });

  async execute(): Promise<void> {
    let service: UsageService;
    try {
      service = openService();
    } catch (err) {
      fail(this.context.stdout, err);
      return;
    }

    const requester: Requester = {
      userId: this.identity,
      displayName: this.identity,
      chatType: this.group ? "group" : "dm",
    };
    const members = (this.members ?? "")
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0);
    const isMember: MembershipProbe = async (userId) => members.includes(userId);
    const allowed = await service.gate.access.isAllowed(requester, isMember);
    const allowance = service.gate.resolveAllowance(this.identity);
    const remaining = await service.gate.remainingBudget(requester);
    const out = this.context.stdout;

    out.write(`Budget for ${this.identity} (period: ${service.gate.period})\n`);
    out.write(`  Allowed: ${allowed ? "yes" : "no"}\n`);
    if (allowance.kind === "unlimited") {
      out.write(`  Allowance: unlimited\n`);
    } else {
      const source = allowance.kind === "guest" ? "guest pool" : "user";
      out.write(`  Allowance: ${formatUsd(allowance.amount)} (${source})\n`);
      out.write(`  Remaining: ${formatUsd(remaining)}\n`);
    }
    out.write(`  Within budget: ${remaining > 0 ? "yes" : "no"}\n`);
  }
}

export class UsageRecordCommand extends Command {
  static override paths = [["usage", "record"]];

  static override usage = Command.Usage({
    description: "Record a usage event by hand, e.g. to correct a missed charge",
    details: `
      Exactly one of \`--tokens\`, \`--seconds\` or \`--image\` must be given.
    `,
    examples: [
      ["Record chat tokens", "tokentab usage record 123456789 --tokens 1500"],
      ["Record an image", "tokentab usage record 123456789 --image 512x512"],
    ],
  });

  identity = Option.String({ name: "identity", required: true });
  name = Option.String("--name", { description: "Display name for a new ledger" });
  tokens = Option.String("--tokens", { description: "Chat tokens used" });
  seconds = Option.String("--seconds", { description: "Seconds of audio transcribed" });
  image = Option.String("--image", { description: "Image size: 256x256, 512x512 or 1024x1024" });

  private event(): UsageEvent {
    const given = [this.tokens, this.seconds, this.image].filter((v) => v !== undefined);
    if (given.length !== 1) {
      throw new Error("Give exactly one of --tokens, --seconds or --image");
    }
    if (this.tokens !== undefined) return { kind: "chat", tokens: Number(this.tokens) };
    if (this.seconds !== undefined) {
      return { kind: "transcription", seconds: Number(this.seconds) };
    }
    return { kind: "image", size: this.image ?? "" };
  }

  async execute(): Promise<void> {
    try {
      const event = this.event();
      const service = openService();
      const results = await service.record(
        { userId: this.identity, displayName: this.name ?? this.identity, chatType: "dm" },
        event,
      );
      for (const result of results) {
        this.context.stdout.write(
          `Recorded ${event.kind} for ${result.identity} on ${result.date}: ${formatUsd(result.cost)}\n`,
        );
      }
    } catch (err) {
      fail(this.context.stdout, err);
    }
  }
}
