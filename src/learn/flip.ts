// src/learn/flip.ts
import { randomInt, type RandomSource } from "../core/utils";
import type { LearnCard } from "../types/card";
import type { LearnSettings } from "../types/settings";

/**
 * Whether `card` should be shown back side first.
 *
 * In "both" mode the side is chosen in proportion to how many correct answers
 * each side still needs; a card with nothing left to learn shows its front.
 */
export function shouldShowFlipped(settings: LearnSettings, card: LearnCard, random: RandomSource): boolean {
  switch (settings.sidesMode) {
    case "flipped":
      return true;
    case "random":
      return randomInt(random, 2) === 1;
    case "both": {
      const needFront = Math.max(0, settings.amountToTest.front - card.getLearnedAmount("front"));
      const needBack = Math.max(0, settings.amountToTest.back - card.getLearnedAmount("back"));
      if (needFront + needBack === 0) return false;
      return randomInt(random, needFront + needBack) < needBack;
    }
    case "normal":
    default:
      return false;
  }
}
