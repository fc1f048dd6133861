import fs from "fs-extra";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AdminResolver, ANONYMOUS_ADMIN_ID } from "../src/adminResolver";
import { CommandService } from "../src/commands";
import { CooldownEvaluator, HOUR_MS } from "../src/cooldown";
import { DataStore, withRecord } from "../src/dataStore";
import { ModerationPipeline } from "../src/moderation";
import { TaskScheduler } from "../src/scheduler";
import { WarningThrottle } from "../src/warningThrottle";
import type { InboundMessage } from "../src/types";
import { createClock, createTempDir, FakePlatform } from "./helpers/fakePlatform";

const CHAT = -1001;
const SECOND_CHAT = -1002;
const TOPIC = 1362;
const USER = 42;
const ADMIN = 10;

const buildHarness = (allowedChatIds: number[] = []) => {
  const platform = new FakePlatform();
  platform.admins.set(CHAT, [{ userId: ADMIN, role: "administrator" }]);
  const store = new DataStore(createTempDir());
  const clock = createClock(new Date(2024, 0, 15, 10, 0));
  const resolver = new AdminResolver({ platform, store, cacheTtlMs: 300_000, now: clock.now });
  const evaluator = new CooldownEvaluator(store, 24, clock.now);
  const throttle = new WarningThrottle(15_000);
  const scheduler = new TaskScheduler();
  const pipeline = new ModerationPipeline(
    { topicId: TOPIC, allowedChatIds, warningDeleteMs: 10_000 },
    { platform, store, resolver, evaluator, throttle, scheduler, now: clock.now },
  );
  const commands = new CommandService({ store, resolver, evaluator, allowedChatIds, now: clock.now });
  return { platform, store, clock, pipeline, commands, scheduler };
};

let nextMessageId = 1;
const post = (overrides: Partial<InboundMessage> = {}): InboundMessage => ({
  chatId: CHAT,
  messageId: nextMessageId++,
  threadId: TOPIC,
  userId: USER,
  username: "alice",
  firstName: "Alice",
  ...overrides,
});

describe("ModerationPipeline", () => {
  let h: ReturnType<typeof buildHarness>;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    nextMessageId = 1;
    h = buildHarness();
  });

  afterEach(() => {
    h.scheduler.cancelAll();
    vi.useRealTimers();
  });

  it("limits a member to one post per day and warns once per burst", async () => {
    expect(await h.pipeline.handleMessage(post({ messageId: 1 }))).toBe("admitted");
    expect(await h.store.fetchMessageRecords()).toEqual({
      [String(CHAT)]: { [String(USER)]: new Date(2024, 0, 15, 10, 0).toISOString() },
    });

    h.clock.set(new Date(2024, 0, 15, 10, 5));
    expect(await h.pipeline.handleMessage(post({ messageId: 2 }))).toBe("rejected");
    expect(h.platform.deleted).toEqual([{ chatId: CHAT, messageId: 2 }]);
    expect(h.platform.sent).toEqual([
      {
        chatId: CHAT,
        threadId: TOPIC,
        messageId: 9000,
        text:
          "⚠️ @alice, you can only send 1 message per 24 hours.\n" +
          "Please wait 23h 55m before sending another message.",
      },
    ]);

    h.clock.set(new Date(2024, 0, 15, 10, 5, 5));
    expect(await h.pipeline.handleMessage(post({ messageId: 3 }))).toBe("rejected");
    expect(h.platform.deleted).toContainEqual({ chatId: CHAT, messageId: 3 });
    expect(h.platform.sent).toHaveLength(1);

    h.clock.set(new Date(2024, 0, 16, 10, 0));
    expect(await h.pipeline.handleMessage(post({ messageId: 4 }))).toBe("admitted");
    expect(h.platform.sent).toHaveLength(1);
  });

  it("warns again once the suppression window has passed", async () => {
    await h.pipeline.handleMessage(post());
    h.clock.advance(60_000);
    await h.pipeline.handleMessage(post());
    h.clock.advance(5_000);
    await h.pipeline.handleMessage(post());
    h.clock.advance(15_000);
    await h.pipeline.handleMessage(post());

    expect(h.platform.sent).toHaveLength(2);
    expect(h.platform.sent[1].text).toContain("Please wait 23h 58m");
  });

  it("deletes the warning after the visibility delay", async () => {
    await h.pipeline.handleMessage(post());
    h.clock.advance(60_000);
    await h.pipeline.handleMessage(post({ messageId: 50 }));

    await vi.advanceTimersByTimeAsync(9_999);
    expect(h.platform.deleted).toEqual([{ chatId: CHAT, messageId: 50 }]);

    await vi.advanceTimersByTimeAsync(1);
    expect(h.platform.deleted).toEqual([
      { chatId: CHAT, messageId: 50 },
      { chatId: CHAT, messageId: 9000 },
    ]);
  });

  it("still warns when the offending message cannot be deleted", async () => {
    await h.pipeline.handleMessage(post());
    h.platform.failDelete = true;
    h.clock.advance(60_000);

    expect(await h.pipeline.handleMessage(post())).toBe("rejected");
    expect(h.platform.sent).toHaveLength(1);
  });

  it("names users without a username by first name", async () => {
    await h.pipeline.handleMessage(post({ username: undefined, firstName: "Bob <3" }));
    h.clock.advance(HOUR_MS);
    await h.pipeline.handleMessage(post({ username: undefined, firstName: "Bob <3" }));

    expect(h.platform.sent[0].text).toBe(
      "⚠️ Bob &lt;3, you can only send 1 message per 24 hours.\nPlease wait 23h 0m before sending another message.",
    );
  });

  it("never touches posts from a real admin", async () => {
    for (let i = 0; i < 3; i += 1) {
      expect(await h.pipeline.handleMessage(post({ userId: ADMIN, username: "boss" }))).toBe("exempt");
      h.clock.advance(60_000);
    }

    expect(h.platform.deleted).toEqual([]);
    expect(await h.store.fetchMessageRecords()).toEqual({});
    expect(await h.commands.execute("status", { chatId: CHAT, userId: ADMIN, args: [] })).toBe(
      "📊 No active message records.",
    );
  });

  it("exempts anonymous admins posting as the group", async () => {
    const anonymous = { userId: ANONYMOUS_ADMIN_ID, senderChatId: CHAT, username: "GroupAnonymousBot" };
    expect(await h.pipeline.handleMessage(post(anonymous))).toBe("exempt");
    expect(await h.pipeline.handleMessage(post(anonymous))).toBe("exempt");
    expect(h.platform.getChatAdministrators).not.toHaveBeenCalled();
  });

  it("lets a green card holder post freely", async () => {
    expect(await h.commands.execute("setcooldown", { chatId: CHAT, userId: ADMIN, args: [String(USER), "0"] })).toBe(
      `✅ Cooldown for user <code>${USER}</code> set to unlimited.`,
    );

    for (let i = 0; i < 3; i += 1) {
      expect(await h.pipeline.handleMessage(post())).toBe("admitted");
      h.clock.advance(20 * 60_000);
    }
    expect(h.platform.deleted).toEqual([]);
    expect(h.platform.sent).toEqual([]);
  });

  it("applies a longer override to one user", async () => {
    await h.store.setCooldownOverride(CHAT, USER, 48);
    await h.pipeline.handleMessage(post());
    h.clock.advance(25 * HOUR_MS);

    expect(await h.pipeline.handleMessage(post())).toBe("rejected");
    expect(h.platform.sent[0].text).toBe(
      "⚠️ @alice, you can only send 1 message per 48 hours.\nPlease wait 23h 0m before sending another message.",
    );
  });

  it("ignores messages outside the monitored topic", async () => {
    expect(await h.pipeline.handleMessage(post({ threadId: 7 }))).toBe("ignored");
    expect(await h.pipeline.handleMessage(post({ threadId: undefined }))).toBe("ignored");
    expect(await h.store.fetchMessageRecords()).toEqual({});
  });

  it("keys cooldowns per chat", async () => {
    expect(await h.pipeline.handleMessage(post())).toBe("admitted");
    expect(await h.pipeline.handleMessage(post({ chatId: SECOND_CHAT }))).toBe("admitted");
    expect(await h.pipeline.handleMessage(post())).toBe("rejected");
  });

  it("only serves allow-listed chats when a list is configured", async () => {
    h = buildHarness([CHAT]);

    expect(await h.pipeline.handleMessage(post({ chatId: SECOND_CHAT }))).toBe("ignored");
    expect(await h.pipeline.handleMessage(post())).toBe("admitted");
  });

  it("gives one admission and one warning to a burst of simultaneous posts", async () => {
    const outcomes = await Promise.all([
      h.pipeline.handleMessage(post()),
      h.pipeline.handleMessage(post()),
      h.pipeline.handleMessage(post()),
    ]);

    expect([...outcomes].sort()).toEqual(["admitted", "rejected", "rejected"]);
    expect(h.platform.deleted).toHaveLength(2);
    expect(h.platform.sent).toHaveLength(1);
  });

  it("keeps rejecting when the records table cannot be written", async () => {
    await h.store.updateMessageRecords((records) => ({
      value: withRecord(
        withRecord(records, CHAT, USER, new Date(2024, 0, 15, 10, 0).getTime()),
        CHAT,
        7,
        new Date(2024, 0, 14, 9, 0).getTime(),
      ),
      result: undefined,
    }));
    const before = await h.store.fetchMessageRecords();
    await fs.ensureDir(`${h.store.messages.filePath}.tmp`);

    h.clock.set(new Date(2024, 0, 15, 10, 1));
    expect(await h.pipeline.handleMessage(post({ messageId: 2 }))).toBe("rejected");
    expect(h.platform.deleted).toEqual([{ chatId: CHAT, messageId: 2 }]);
    expect(h.platform.sent.map((message) => message.text)).toEqual([
      "⚠️ @alice, you can only send 1 message per 24 hours.\n" +
        "Please wait 23h 59m before sending another message.",
    ]);
    expect(await h.store.fetchMessageRecords()).toEqual(before);
  });

  it("prunes expired records while evaluating", async () => {
    await h.pipeline.handleMessage(post({ userId: 1 }));
    h.clock.advance(25 * HOUR_MS);
    await h.pipeline.handleMessage(post({ userId: 2 }));

    expect(await h.store.fetchMessageRecords()).toEqual({
      [String(CHAT)]: { "2": new Date(2024, 0, 16, 11, 0).toISOString() },
    });
  });
});
