/**
 * Static food guidance returned with every recommendation
 */

export interface FoodAdvice {
  readonly foodsToInclude: readonly string[];
  readonly foodsToAvoid: readonly string[];
  readonly generalTips: readonly string[];
}

export const FOOD_ADVICE: FoodAdvice = Object.freeze({
  foodsToInclude: Object.freeze(["leafy greens", "berries", "nuts", "fish"]),
  foodsToAvoid: Object.freeze(["sugary snacks", "white bread", "processed foods"]),
  generalTips: Object.freeze([
    "Eat smaller, more frequent meals to prevent large spikes",
    "Pair carbohydrates with protein or fiber to slow absorption",
    "Stay hydrated throughout the day",
  ]),
});
