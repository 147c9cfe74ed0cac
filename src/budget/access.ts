import type { BudgetConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

export type ChatType = "dm" | "group";

export interface Requester {
  readonly userId: string;
  readonly displayName: string;
  readonly chatType: ChatType;
}

/** Asks the chat transport whether `userId` belongs to the current group chat. */
export type MembershipProbe = (userId: string) => Promise<boolean>;

export class AccessPolicy {
  constructor(
    private readonly config: BudgetConfig,
    private readonly logger: Logger,
  ) {}

  isAdmin(userId: string): boolean {
    const admins = this.config.adminUserIds;
    return admins !== "-" && admins.includes(userId);
  }

  /** Position in the allow-list, or -1. An open allow-list has no positions. */
  allowListIndex(userId: string): number {
    const allowed = this.config.allowedUserIds;
    return allowed === "*" ? -1 : allowed.indexOf(userId);
  }

  isAllowListed(userId: string): boolean {
    return this.config.allowedUserIds === "*" || this.allowListIndex(userId) !== -1;
  }

  /**
   * Open allow-list, admins and allow-listed users always pass. In a group
   * chat anyone passes when an allow-listed user or admin is a member.
   */
  async isAllowed(requester: Requester, isMember?: MembershipProbe): Promise<boolean> {
    if (this.isAllowListed(requester.userId) || this.isAdmin(requester.userId)) {
      return true;
    }
    if (requester.chatType !== "group" || !isMember) return false;

    const allowed = this.config.allowedUserIds === "*" ? [] : this.config.allowedUserIds;
    const admins = this.config.adminUserIds === "-" ? [] : this.config.adminUserIds;
    for (const userId of [...allowed, ...admins]) {
      if (await isMember(userId)) {
        this.logger.info(
          { memberId: userId, userId: requester.userId },
          "Trusted member present, allowing group chat message",
        );
        return true;
      }
    }
    this.logger.info(
      { userId: requester.userId, name: requester.displayName },
      "Group chat message from untrusted user rejected",
    );
    return false;
  }
}
