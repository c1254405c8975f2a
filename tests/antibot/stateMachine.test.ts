import { describe, expect, it } from "vitest";
import { VerificationStateMachine, VerificationTransition } from "../../src/antibot/stateMachine";
import { InvalidTransitionError } from "../../src/core/errors";

function recordingMachine(maxAttempts = 3) {
  const transitions: VerificationTransition[] = [];
  const machine = new VerificationStateMachine(
    7,
    maxAttempts,
    (transition) => transitions.push(transition),
    () => new Date("2026-03-01T00:00:00.000Z")
  );
  return { machine, transitions };
}

describe("VerificationStateMachine", () => {
  it("walks a full recovery cycle and resets the budget on a clean page", () => {
    const { machine, transitions } = recordingMachine();
    expect(machine.state).toBe("normal");

    machine.suspect("selector #captcha");
    expect(machine.isSuspended()).toBe(true);
    machine.beginVerification();
    expect(machine.attempts).toBe(1);
    machine.markRecovered();
    expect(machine.isSuspended()).toBe(false);
    machine.confirmHealthy();

    expect(machine.state).toBe("normal");
    expect(machine.attempts).toBe(0);
    expect(transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      "normal->suspected",
      "suspected->verifying",
      "verifying->recovered",
      "recovered->normal",
    ]);
    expect(transitions[0]).toEqual({
      workerId: 7,
      from: "normal",
      to: "suspected",
      attempts: 0,
      reason: "selector #captcha",
      at: "2026-03-01T00:00:00.000Z",
    });
  });

  it("drops back to suspected after a failed attempt", () => {
    const { machine } = recordingMachine();
    machine.suspect("title");
    machine.beginVerification();
    machine.markFailedAttempt("timed out");
    expect(machine.state).toBe("suspected");
    machine.beginVerification();
    expect(machine.attempts).toBe(2);
  });

  it("keeps counting attempts when a recovered worker is challenged again", () => {
    const { machine } = recordingMachine();
    machine.suspect("body");
    machine.beginVerification();
    machine.markRecovered();
    machine.suspect("body");
    machine.confirmHealthy();
    expect(machine.state).toBe("suspected");
    expect(machine.attempts).toBe(1);
  });

  it("refuses to verify once the budget is spent and ends in abandoned", () => {
    const { machine } = recordingMachine(2);
    machine.suspect("selector");
    machine.beginVerification();
    machine.markFailedAttempt();
    machine.beginVerification();
    machine.markFailedAttempt();

    expect(machine.canAttemptRecovery()).toBe(false);
    expect(() => machine.beginVerification()).toThrow(InvalidTransitionError);

    machine.abandon("budget spent");
    expect(machine.state).toBe("abandoned");
    expect(() => machine.suspect("again")).toThrow("Invalid verification transition: abandoned -> suspected");
  });

  it("rejects transitions the lifecycle does not allow", () => {
    const { machine, transitions } = recordingMachine();
    expect(() => machine.markRecovered()).toThrow("Invalid verification transition: normal -> recovered");
    expect(() => machine.abandon()).toThrow(InvalidTransitionError);
    expect(machine.state).toBe("normal");
    expect(transitions).toHaveLength(0);
  });
});
