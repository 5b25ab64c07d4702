/**
 * Unit tests for state-machine.ts
 */

import { describe, it, expect } from "vitest";
import {
  assertValidTransition,
  InvalidStateTransitionError,
  isTerminalStatus,
  VALID_TRANSITIONS,
} from "../state-machine.js";
import type { ExpenseStatus } from "../../types/expense-contract.js";

describe("State Machine", () => {
  describe("VALID_TRANSITIONS map", () => {
    it("defines transitions for every status", () => {
      const statuses: ExpenseStatus[] = ["draft", "submitted", "approved", "rejected"];
      for (const status of statuses) {
        expect(VALID_TRANSITIONS.has(status)).toBe(true);
      }
    });

    it("terminal statuses have no valid transitions", () => {
      expect(VALID_TRANSITIONS.get("approved")?.size).toBe(0);
      expect(VALID_TRANSITIONS.get("rejected")?.size).toBe(0);
    });
  });

  describe("assertValidTransition", () => {
    it("allows draft → submitted", () => {
      expect(() => assertValidTransition("draft", "submitted")).not.toThrow();
    });

    it("allows submitted → approved", () => {
      expect(() => assertValidTransition("submitted", "approved")).not.toThrow();
    });

    it("allows submitted → rejected", () => {
      expect(() => assertValidTransition("submitted", "rejected")).not.toThrow();
    });

    it("rejects draft → approved", () => {
      expect(() => assertValidTransition("draft", "approved")).toThrow(
        InvalidStateTransitionError
      );
    });

    it("rejects rejected → submitted", () => {
      expect(() => assertValidTransition("rejected", "submitted")).toThrow(
        InvalidStateTransitionError
      );
    });

    it("rejects approved → rejected", () => {
      expect(() => assertValidTransition("approved", "rejected")).toThrow(
        InvalidStateTransitionError
      );
    });

    it("error carries from and to", () => {
      try {
        assertValidTransition("approved", "draft");
        expect.unreachable("should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidStateTransitionError);
        if (err instanceof InvalidStateTransitionError) {
          expect(err.from).toBe("approved");
          expect(err.to).toBe("draft");
          expect(err.message).toBe("Invalid state transition: 'approved' → 'draft'");
        }
      }
    });
  });

  describe("isTerminalStatus", () => {
    it("is true only for approved and rejected", () => {
      expect(isTerminalStatus("draft")).toBe(false);
      expect(isTerminalStatus("submitted")).toBe(false);
      expect(isTerminalStatus("approved")).toBe(true);
      expect(isTerminalStatus("rejected")).toBe(true);
    });
  });
});
