export type EstimatedField = "weight" | "protein" | "fat" | "carbs";

export type ParsedNutrition = {
  dishName: string;
  weightG: number;
  calories: number;
  proteinG: number;
  fatG: number;
  carbsG: number;
  /** Fields that were not in the text and were filled in from calories or defaults. */
  estimated: EstimatedField[];
};

export const DEFAULT_DISH_WEIGHT_G = 200;
const GRAMS_PER_KCAL = 1.8;
const RESCALE_TOLERANCE = 0.3;

const NUM = String.raw`(\d+(?:[.,]\d+)?)`;
const GRAMS = String.raw`(?:g|grams?)\b`;

const DISH_LABEL = /^\s*dish(?:\s+name)?\s*[:\-]\s*(.+)$/im;

const WEIGHT_PATTERNS = [
  new RegExp(String.raw`weight\s*[:\-]?\s*${NUM}\s*${GRAMS}`, "i"),
  new RegExp(String.raw`${NUM}\s*${GRAMS}\s*weight`, "i"),
  new RegExp(String.raw`approximately\s*${NUM}\s*${GRAMS}`, "i")
];

const CALORIE_PATTERNS = [
  new RegExp(String.raw`calories\s*[:\-]?\s*${NUM}`, "i"),
  new RegExp(String.raw`${NUM}\s*(?:kcal|calories|cal)\b`, "i")
];

const PROTEIN_PATTERNS = [
  new RegExp(String.raw`proteins?\s*[:\-]?\s*${NUM}`, "i"),
  new RegExp(String.raw`${NUM}\s*${GRAMS}\s*(?:of\s+)?protein`, "i")
];

const FAT_PATTERNS = [
  new RegExp(String.raw`fats?\s*[:\-]?\s*${NUM}`, "i"),
  new RegExp(String.raw`${NUM}\s*${GRAMS}\s*(?:of\s+)?fat`, "i")
];

const CARBS_PATTERNS = [
  new RegExp(String.raw`carb(?:ohydrate)?s?\s*[:\-]?\s*${NUM}`, "i"),
  new RegExp(String.raw`${NUM}\s*${GRAMS}\s*(?:of\s+)?carb`, "i")
];

// Share of calories and kcal per gram used to back-fill a missing macro.
const MACRO_SPLIT = {
  protein: { share: 0.2, kcalPerGram: 4 },
  fat: { share: 0.25, kcalPerGram: 9 },
  carbs: { share: 0.55, kcalPerGram: 4 }
} as const;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function firstNumber(text: string, patterns: RegExp[]): number {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match?.[1]) {
      const value = Number(match[1].replace(",", "."));
      if (Number.isFinite(value)) return value;
    }
  }
  return 0;
}

function findDishName(text: string): string {
  const labelled = DISH_LABEL.exec(text);
  if (labelled?.[1]) return labelled[1].trim();

  const firstLine = text
    .split("\n")
    .map((line) => line.trim())
    .find(Boolean);
  if (firstLine && firstLine.length > 3 && !/\d/.test(firstLine)) {
    return firstLine.replace(/[.:]+$/, "");
  }
  return "";
}

/**
 * Extracts dish, weight, calories and macros from the analysis reply.
 * Missing macros are estimated from calories and a dish-name sanity pass nudges obvious misses.
 */
export function parseNutrition(rawText: string): ParsedNutrition {
  const text = rawText.replace(/\*+/g, "");
  const estimated: EstimatedField[] = [];

  const dishName = findDishName(text);
  const calories = firstNumber(text, CALORIE_PATTERNS);
  let weightG = firstNumber(text, WEIGHT_PATTERNS);
  let proteinG = firstNumber(text, PROTEIN_PATTERNS);
  let fatG = firstNumber(text, FAT_PATTERNS);
  let carbsG = firstNumber(text, CARBS_PATTERNS);

  if (calories > 0) {
    if (proteinG === 0) {
      proteinG = round1((calories * MACRO_SPLIT.protein.share) / MACRO_SPLIT.protein.kcalPerGram);
      estimated.push("protein");
    }
    if (fatG === 0) {
      fatG = round1((calories * MACRO_SPLIT.fat.share) / MACRO_SPLIT.fat.kcalPerGram);
      estimated.push("fat");
    }
    if (carbsG === 0) {
      carbsG = round1((calories * MACRO_SPLIT.carbs.share) / MACRO_SPLIT.carbs.kcalPerGram);
      estimated.push("carbs");
    }

    const implied = proteinG * 4 + fatG * 9 + carbsG * 4;
    if (implied > 0 && Math.abs(implied - calories) > calories * RESCALE_TOLERANCE) {
      const ratio = calories / implied;
      proteinG = round1(proteinG * ratio);
      fatG = round1(fatG * ratio);
      carbsG = round1(carbsG * ratio);
    }
  }

  const dish = dishName.toLowerCase();
  if (dish.includes("rice")) {
    if (carbsG < 10) carbsG = 30;
  } else if (dish.includes("egg")) {
    if (proteinG < 5) proteinG = 12;
  } else if (dish.includes("vegetable")) {
    if (carbsG < 5) carbsG = 8;
  }

  if (weightG === 0) {
    weightG = calories > 0 ? round1(calories * GRAMS_PER_KCAL) : DEFAULT_DISH_WEIGHT_G;
    estimated.push("weight");
  }

  return { dishName, weightG, calories, proteinG, fatG, carbsG, estimated };
}
