/**
 * @file message-broadcaster.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MessageBroadcasterImpl } from "../../../src/application/services/message-broadcaster-impl.js";
import { InMemoryConnectionRegistry } from "../../../src/infrastructure/persistence/in-memory-registry.js";
import { languageUpdate } from "../../../src/protocol/messages.js";
import { FakeTransport, makeConnection, silentLogger } from "../../helpers/fakes.js";

describe("MessageBroadcasterImpl", () => {
  let registry: InMemoryConnectionRegistry;
  let broadcaster: MessageBroadcasterImpl;
  let transports: FakeTransport[];

  beforeEach(() => {
    registry = new InMemoryConnectionRegistry();
    broadcaster = new MessageBroadcasterImpl({ connectionRegistry: registry, logger: silentLogger });
    transports = [new FakeTransport(), new FakeTransport(), new FakeTransport()];
    transports.forEach((transport, index) => {
      registry.register(makeConnection(`c${index + 1}`, transport));
    });
  });

  describe("broadcastToAll", () => {
    it("should send the same bytes to every connection", async () => {
      const message = languageUpdate(["fr"]);

      const result = await broadcaster.broadcastToAll(message);

      expect(result).toEqual({ delivered: 3, skipped: 0, evicted: [] });
      for (const transport of transports) {
        expect(transport.sent).toEqual([JSON.stringify(message)]);
      }
    });

    it("should withhold the message from recipients matched by the filter", async () => {
      const result = await broadcaster.broadcastToAll({ info: "x" }, async (recipient) =>
        recipient.id === "c2"
      );

      expect(result).toEqual({ delivered: 2, skipped: 1, evicted: [] });
      expect(transports.map((transport) => transport.sent.length)).toEqual([1, 0, 1]);
    });

    it("should withhold without evicting when the filter throws", async () => {
      const result = await broadcaster.broadcastToAll({ info: "x" }, async (recipient) => {
        if (recipient.id === "c1") {
          throw new Error("moderation unavailable");
        }
        return false;
      });

      expect(result).toEqual({ delivered: 2, skipped: 1, evicted: [] });
      expect(registry.has("c1")).toBe(true);
    });

    it("should evict connections whose write fails and still deliver to the rest", async () => {
      transports[1].failWrites = true;

      const result = await broadcaster.broadcastToAll({ info: "x" });

      expect(result).toEqual({ delivered: 2, skipped: 0, evicted: ["c2"] });
      expect(registry.has("c2")).toBe(false);
      expect(registry.count()).toBe(2);
      expect(transports[1].terminated).toBe(true);
      expect(transports[0].sent).toEqual(['{"info":"x"}']);
      expect(transports[2].sent).toEqual(['{"info":"x"}']);
    });

    it("should evict connections whose socket already closed", async () => {
      transports[2].isOpen = false;

      const result = await broadcaster.broadcastToAll({ info: "x" });

      expect(result.evicted).toEqual(["c3"]);
      expect(registry.has("c3")).toBe(false);
    });

    it("should skip connections already marked disconnected", async () => {
      registry.get("c1")?.markDisconnected();

      const result = await broadcaster.broadcastToAll({ info: "x" });

      expect(result).toEqual({ delivered: 2, skipped: 0, evicted: [] });
      expect(transports[0].sent).toEqual([]);
    });
  });

  describe("sendToConnection", () => {
    it("should write to a single connection", async () => {
      const connection = registry.get("c1");
      if (!connection) throw new Error("c1 not registered");

      expect(await broadcaster.sendToConnection(connection, { info: "hi" })).toBe(true);
      expect(transports[0].sent).toEqual(['{"info":"hi"}']);
      expect(transports[1].sent).toEqual([]);
    });

    it("should evict and return false when the write fails", async () => {
      const connection = registry.get("c1");
      if (!connection) throw new Error("c1 not registered");
      transports[0].failWrites = true;

      expect(await broadcaster.sendToConnection(connection, { info: "hi" })).toBe(false);
      expect(registry.has("c1")).toBe(false);
      expect(transports[0].terminated).toBe(true);
    });
  });
});
