/**
 * Deck Handler Tests
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BASE_TIME, createDispatcherHarness, type DispatcherHarness } from "../../__tests__/test-helpers";

const LANG = BASE_TIME + 2;
const FRENCH = BASE_TIME + 3;
const SPANISH = BASE_TIME + 4;
const CARD = BASE_TIME + 6;

describe("deck handlers", () => {
  let harness: DispatcherHarness;

  beforeEach(async () => {
    harness = await createDispatcherHarness();
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  describe("with a deck tree", () => {
    beforeEach(async () => {
      await harness.result("createDeck", { deckName: "Lang::French" });
      await harness.result("createDeck", { deckName: "Lang::Spanish" });
      await harness.result("addNote", {
        note: { deckName: "Lang::French", modelName: "Basic", fields: { Front: "bonjour" } },
      });
    });

    it("lists decks", async () => {
      expect(await harness.result("deckNames")).toEqual(["Default", "Lang", "Lang::French", "Lang::Spanish"]);
      expect(await harness.result("deckNamesAndIds")).toEqual({
        Default: 1,
        Lang: LANG,
        "Lang::French": FRENCH,
        "Lang::Spanish": SPANISH,
      });
    });

    it("refuses to create an existing deck", async () => {
      expect((await harness.call("createDeck", { deckName: "lang" })).error).toBe("Deck 'lang' already exists");
    });

    it("describes the children of a deck by relative name", async () => {
      expect(await harness.result("getDeckInfo", { deckName: "Lang", includeTimeStats: false })).toEqual([
        {
          id: FRENCH,
          name: "French",
          newCount: 1,
          learningCount: 0,
          reviewCount: 0,
          totalCards: 1,
          isFiltered: false,
        },
        {
          id: SPANISH,
          name: "Spanish",
          newCount: 0,
          learningCount: 0,
          reviewCount: 0,
          totalCards: 0,
          isFiltered: false,
        },
      ]);
    });

    it("describes a single deck with its time stats", async () => {
      expect(await harness.result("getDeckInfo", { deckName: "Lang", wantSingleDeckStats: true })).toEqual([
        {
          id: LANG,
          name: "Lang",
          newCount: 1,
          learningCount: 0,
          reviewCount: 0,
          totalCards: 1,
          isFiltered: false,
          timeStats: {
            period: "all time",
            totalReviews: 0,
            totalTimeSeconds: 0,
            averageTimePerCardSeconds: 0,
          },
        },
      ]);
      expect(await harness.result("getDeckInfo", { deckName: "Nope" })).toBeNull();
    });

    it("groups cards by deck and moves them", async () => {
      expect(await harness.result("getDecks", { cards: [CARD, 1] })).toEqual({ "Lang::French": [CARD] });

      expect(await harness.result("changeDeck", { cards: [CARD], deck: "Lang::Spanish" })).toBeNull();
      expect(await harness.result("getDecks", { cards: [CARD] })).toEqual({ "Lang::Spanish": [CARD] });
    });

    it("renames a deck with its children", async () => {
      expect(await harness.result("renameDeck", { oldName: "Lang", newName: "Languages" })).toBe(true);
      expect(await harness.result("deckNames")).toEqual([
        "Default",
        "Languages",
        "Languages::French",
        "Languages::Spanish",
      ]);
    });

    it("deletes a deck, moving its cards to Default", async () => {
      expect(await harness.result("deleteDeck", { deckName: "Lang::French" })).toBe(true);
      expect(await harness.result("getDecks", { cards: [CARD] })).toEqual({ Default: [CARD] });
    });

    it("deletes decks with their cards and skips unknown names", async () => {
      expect(await harness.result("deleteDecks", { decks: ["Lang", "Nope"], cardsToo: true })).toBeNull();
      expect(await harness.result("deckNames")).toEqual(["Default"]);
      expect(await harness.result("findCards", { query: "" })).toEqual([]);
    });

    it("refuses to delete the Default deck or an unknown one", async () => {
      expect((await harness.call("deleteDeck", { deckName: "Default" })).error).toBe(
        "The Default deck cannot be deleted"
      );
      expect((await harness.call("deleteDeck", { deckName: "Nope" })).error).toBe("Deck 'Nope' does not exist");
    });
  });

  describe("option groups", () => {
    it("reads a deck's group", async () => {
      expect(await harness.result("getDeckConfig", { deck: "Default" })).toMatchObject({
        id: 1,
        name: "Default",
        new: { perDay: 20 },
        rev: { perDay: 200 },
      });
      expect(await harness.result("getDeckConfig", { deck: "Nope" })).toBe(false);
    });

    it("clones, assigns, saves and removes groups", async () => {
      const fast = BASE_TIME + 2;
      expect(await harness.result("cloneDeckConfigId", { name: "Fast" })).toBe(fast);
      expect(await harness.result("cloneDeckConfigId", { name: "Ghost", cloneFrom: 99 })).toBe(false);

      expect(await harness.result("setDeckConfigId", { decks: ["Default"], configId: fast })).toBe(true);
      expect(await harness.result("setDeckConfigId", { decks: ["Nope"], configId: fast })).toBe(false);

      const config = { id: fast, name: "Fast", new: { perDay: 50 }, rev: { perDay: 100 } };
      expect(await harness.result("saveDeckConfig", { config })).toBe(true);
      expect(await harness.result("getDeckConfig", { deck: "Default" })).toMatchObject(config);

      expect(await harness.result("removeDeckConfigId", { configId: 1 })).toBe(false);
      expect(await harness.result("removeDeckConfigId", { configId: fast })).toBe(true);
      expect(await harness.result("getDeckConfig", { deck: "Default" })).toMatchObject({ id: 1 });
    });

    it("rejects a group without a name", async () => {
      expect(
        (
          await harness.call("saveDeckConfig", {
            config: { id: 1, name: "", new: { perDay: 1 }, rev: { perDay: 1 } },
          })
        ).error
      ).toBe("config.name: Config name is required");
    });
  });
});
