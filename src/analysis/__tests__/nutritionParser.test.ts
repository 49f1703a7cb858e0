import { DEFAULT_DISH_WEIGHT_G, parseNutrition } from "../nutritionParser";

describe("parseNutrition", () => {
  it("reads every labelled field", () => {
    const text = ["Dish: Chicken salad", "Weight: 250 g", "Calories: 320 kcal", "Protein: 28 g", "Fat: 18 g", "Carbs: 12 g"].join(
      "\n"
    );

    expect(parseNutrition(text)).toEqual({
      dishName: "Chicken salad",
      weightG: 250,
      calories: 320,
      proteinG: 28,
      fatG: 18,
      carbsG: 12,
      estimated: []
    });
  });

  it("estimates missing macros and weight from calories", () => {
    expect(parseNutrition("Dish: Pancakes\nCalories: 360 kcal")).toEqual({
      dishName: "Pancakes",
      weightG: 648,
      calories: 360,
      proteinG: 18,
      fatG: 10,
      carbsG: 49.5,
      estimated: ["protein", "fat", "carbs", "weight"]
    });
  });

  it("rescales macros that disagree with the calorie count", () => {
    const parsed = parseNutrition("Dish: Burger\nWeight: 300 g\nCalories: 500\nProtein: 10 g\nFat: 10 g\nCarbs: 10 g");
    expect([parsed.proteinG, parsed.fatG, parsed.carbsG]).toEqual([29.4, 29.4, 29.4]);
    expect(parsed.estimated).toEqual([]);
  });

  it("raises implausibly low carbs for rice dishes", () => {
    const parsed = parseNutrition("Dish: Fried rice\nWeight: 200 g\nCalories: 40\nProtein: 2 g\nFat: 1 g\nCarbs: 5 g");
    expect(parsed.carbsG).toBe(30);
    expect(parsed.proteinG).toBe(2);
  });

  it("raises implausibly low protein for egg dishes", () => {
    const parsed = parseNutrition("Dish: Boiled eggs\nWeight: 100 g\nCalories: 20\nProtein: 2 g\nFat: 1 g\nCarbs: 1 g");
    expect(parsed.proteinG).toBe(12);
    expect(parsed.carbsG).toBe(1);
  });

  it("accepts a comma as the decimal separator", () => {
    const parsed = parseNutrition("Dish: Yogurt\nWeight: 150 g\nCalories: 95,5 kcal\nProtein: 8,5 g\nFat: 3,2 g\nCarbs: 9 g");
    expect(parsed).toMatchObject({ calories: 95.5, proteinG: 8.5, fatG: 3.2, carbsG: 9, weightG: 150 });
  });

  it("ignores markdown emphasis", () => {
    const parsed = parseNutrition(
      "**Dish:** Oatmeal\n**Weight:** 250 g\n**Calories:** 150 kcal\n**Protein:** 5 g\n**Fat:** 3 g\n**Carbs:** 27 g"
    );
    expect(parsed).toMatchObject({ dishName: "Oatmeal", weightG: 250, calories: 150, proteinG: 5, fatG: 3, carbsG: 27 });
  });

  it("falls back to a descriptive first line for the dish name", () => {
    const parsed = parseNutrition("Grilled salmon with rice\nApproximately 520 kcal in this portion.");
    expect(parsed).toEqual({
      dishName: "Grilled salmon with rice",
      weightG: 936,
      calories: 520,
      proteinG: 26,
      fatG: 14.4,
      carbsG: 71.5,
      estimated: ["protein", "fat", "carbs", "weight"]
    });
  });

  it("returns zeros and a default weight for text with nothing in it", () => {
    expect(parseNutrition("")).toEqual({
      dishName: "",
      weightG: DEFAULT_DISH_WEIGHT_G,
      calories: 0,
      proteinG: 0,
      fatG: 0,
      carbsG: 0,
      estimated: ["weight"]
    });
  });
});
