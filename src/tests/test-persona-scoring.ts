import { expect, test } from "vitest";
import { pickWinner, scorePersonas, selectPersona } from "../engine/scoring.js";
import { createPersonaRegistry } from "../personas/index.js";
import type { Turn } from "../state/types.js";

const personas = createPersonaRegistry();
const auto = { lockedPersona: null };

function scoreOf(text: string, key: string, memory: Turn[] = []): number | undefined {
  return scorePersonas(text, memory, personas).find((s) => s.key === key)?.score;
}

test("scores come back in registry order", () => {
  const keys = scorePersonas("hi", [], personas).map((s) => s.key);

  expect(keys).toEqual(personas.keys());
});

test("keywords, question mark and the winner for a mixed message", () => {
  const text = "What is the meaning of fate in this realm?";

  expect(scoreOf(text, "manhua")).toBe(4);
  expect(scoreOf(text, "academic")).toBe(2);
  expect(scoreOf(text, "default")).toBe(1);
  expect(scoreOf(text, "oracle")).toBe(0);
  expect(selectPersona(text, [], auto, personas)).toBe("manhua");
});

test("nothing scoring resolves to default", () => {
  expect(selectPersona("hello there", [], auto, personas)).toBe("default");
});

test("ties go to the persona listed first", () => {
  expect(scoreOf("dream of history", "dreamcore")).toBe(2);
  expect(scoreOf("dream of history", "lorekeeper")).toBe(2);
  expect(selectPersona("dream of history", [], auto, personas)).toBe("dreamcore");

  // "moon" belongs to both dreamcore and ethereal
  expect(selectPersona("the moon", [], auto, personas)).toBe("dreamcore");
});

test("an exclamation mark favours manhua and oracle", () => {
  expect(scoreOf("wow!", "manhua")).toBe(1);
  expect(scoreOf("wow!", "oracle")).toBe(1);
  expect(selectPersona("wow!", [], auto, personas)).toBe("manhua");
});

test("an assistant last turn adds a point to default", () => {
  const memory: Turn[] = [
    { role: "user", content: "hey" },
    { role: "assistant", content: "hi" },
  ];

  expect(scoreOf("wow!", "default", memory)).toBe(1);
  expect(selectPersona("wow!", memory, auto, personas)).toBe("default");
  expect(scoreOf("wow!", "default", [{ role: "user", content: "hey" }])).toBe(0);
});

test("keywords only count as whole words and ignore case", () => {
  expect(scoreOf("dreaming of a realmless place", "dreamcore")).toBe(0);
  expect(scoreOf("dreaming of a realmless place", "manhua")).toBe(0);
  expect(scoreOf("FATE decides", "manhua")).toBe(2);
});

test("a locked persona skips scoring", () => {
  expect(selectPersona("What is the meaning of fate?", [], { lockedPersona: "seraph" }, personas)).toBe("seraph");
});

test("a locked persona that no longer exists resolves to default", () => {
  expect(selectPersona("fate realm", [], { lockedPersona: "retired" }, personas)).toBe("default");
});

test("pickWinner keeps the first maximum", () => {
  expect(
    pickWinner([
      { key: "a", score: 1 },
      { key: "b", score: 3 },
      { key: "c", score: 3 },
    ])
  ).toBe("b");
  expect(pickWinner([])).toBe("default");
});

test("the question bonus needs the text to end on the question mark", () => {
  expect(scoreOf("really?", "default")).toBe(1);
  expect(scoreOf("really? ", "default")).toBe(0);
  expect(scoreOf("really? ok", "default")).toBe(0);
});
