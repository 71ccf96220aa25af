/**
 * Scheduler Tests
 */

import { describe, expect, it } from "vitest";
import type { Card } from "../collection-schema";
import {
  answerButtons,
  answerCard,
  forgetCard,
  formatInterval,
  isDue,
  nextState,
} from "../scheduler";
import { CardQueue, CardType, ReviewKind } from "../types";

function makeCard(overrides: Partial<Card> = {}): Card {
  return {
    id: 100,
    nid: 50,
    did: 1,
    odid: 0,
    ord: 0,
    type: CardType.New,
    queue: CardQueue.New,
    due: 1,
    ivl: 0,
    factor: 0,
    reps: 0,
    streak: 0,
    lapses: 0,
    flags: 0,
    mod: 0,
    ...overrides,
  };
}

describe("nextState", () => {
  it("grows a mature interval by the factor on good", () => {
    expect(nextState({ ivl: 6, factor: 2500, streak: 2 }, 3)).toEqual({
      ivl: 15,
      factor: 2500,
      streak: 3,
    });
    expect(nextState({ ivl: 15, factor: 2500, streak: 3 }, 3).ivl).toBe(38);
  });

  it("uses 1 then 6 days for the first two good answers", () => {
    expect(nextState({ ivl: 0, factor: 0, streak: 0 }, 3).ivl).toBe(1);
    expect(nextState({ ivl: 1, factor: 2500, streak: 1 }, 3).ivl).toBe(6);
  });

  it("treats a zero factor as the default factor", () => {
    expect(nextState({ ivl: 0, factor: 0, streak: 0 }, 3).factor).toBe(2500);
  });

  it("grows hard intervals by at least one day and lowers the factor", () => {
    expect(nextState({ ivl: 6, factor: 2500, streak: 2 }, 2)).toEqual({
      ivl: 7,
      factor: 2350,
      streak: 3,
    });
  });

  it("applies the easy bonus", () => {
    expect(nextState({ ivl: 6, factor: 2500, streak: 2 }, 4)).toEqual({
      ivl: 21,
      factor: 2650,
      streak: 3,
    });
    expect(nextState({ ivl: 0, factor: 0, streak: 0 }, 4).ivl).toBe(4);
    expect(nextState({ ivl: 4, factor: 2650, streak: 1 }, 4).ivl).toBe(10);
  });

  it("resets the streak on again", () => {
    expect(nextState({ ivl: 30, factor: 2500, streak: 5 }, 1)).toEqual({
      ivl: 1,
      factor: 2300,
      streak: 0,
    });
  });

  it("clamps the factor", () => {
    expect(nextState({ ivl: 1, factor: 1400, streak: 0 }, 1).factor).toBe(1300);
    expect(nextState({ ivl: 1, factor: 3000, streak: 0 }, 4).factor).toBe(3000);
  });
});

describe("answerCard", () => {
  it("moves a new card into review", () => {
    const card = makeCard();
    const outcome = answerCard(card, 3, 100);

    expect(outcome).toEqual({ ivl: 1, lastIvl: 0, factor: 2500, kind: ReviewKind.Learn });
    expect(card.type).toBe(CardType.Review);
    expect(card.queue).toBe(CardQueue.Review);
    expect(card.due).toBe(101);
    expect(card.reps).toBe(1);
    expect(card.streak).toBe(1);
  });

  it("counts a lapse when a review card is failed", () => {
    const card = makeCard({
      type: CardType.Review,
      queue: CardQueue.Review,
      ivl: 10,
      factor: 2500,
      streak: 3,
      due: 100,
    });
    const outcome = answerCard(card, 1, 100);

    expect(outcome.kind).toBe(ReviewKind.Review);
    expect(outcome.lastIvl).toBe(10);
    expect(card.lapses).toBe(1);
    expect(card.type).toBe(CardType.Relearning);
    expect(card.queue).toBe(CardQueue.Learning);
    expect(card.due).toBe(101);
  });

  it("sends a filtered card back to its home deck", () => {
    const card = makeCard({ did: 9, odid: 5 });
    const outcome = answerCard(card, 3, 100);

    expect(outcome.kind).toBe(ReviewKind.Filtered);
    expect(card.did).toBe(5);
    expect(card.odid).toBe(0);
  });
});

describe("forgetCard", () => {
  it("clears the card's history", () => {
    const card = makeCard({
      type: CardType.Review,
      queue: CardQueue.Review,
      ivl: 20,
      factor: 2300,
      reps: 7,
      streak: 4,
      lapses: 2,
    });
    forgetCard(card, 42);

    expect(card).toMatchObject({
      type: CardType.New,
      queue: CardQueue.New,
      due: 42,
      ivl: 0,
      factor: 0,
      reps: 0,
      streak: 0,
      lapses: 0,
    });
  });
});

describe("isDue", () => {
  it("is true for learning and review cards due today or earlier", () => {
    expect(isDue(makeCard({ queue: CardQueue.Review, due: 99 }), 100)).toBe(true);
    expect(isDue(makeCard({ queue: CardQueue.Learning, due: 100 }), 100)).toBe(true);
    expect(isDue(makeCard({ queue: CardQueue.Review, due: 101 }), 100)).toBe(false);
  });

  it("is false for new and suspended cards", () => {
    expect(isDue(makeCard({ due: 1 }), 100)).toBe(false);
    expect(isDue(makeCard({ queue: CardQueue.Suspended, due: 1 }), 100)).toBe(false);
  });
});

describe("formatInterval", () => {
  it("formats days, months and years", () => {
    expect(formatInterval(3)).toBe("3d");
    expect(formatInterval(45)).toBe("1.5mo");
    expect(formatInterval(60)).toBe("2mo");
    expect(formatInterval(400)).toBe("1.1y");
    expect(formatInterval(730)).toBe("2y");
  });
});

describe("answerButtons", () => {
  it("lists the four answers with their intervals", () => {
    expect(answerButtons(makeCard())).toEqual([
      { ease: 1, label: "Again", timing: "1d" },
      { ease: 2, label: "Hard", timing: "1d" },
      { ease: 3, label: "Good", timing: "1d" },
      { ease: 4, label: "Easy", timing: "4d" },
    ]);
  });
});
