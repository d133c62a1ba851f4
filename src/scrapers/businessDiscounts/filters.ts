/**
 * Narrowing and ordering the listing before it is traversed: category
 * checkboxes, a minimum business discount and the "business discount,
 * descending" sort. Each step is best-effort; a control that cannot be found
 * is reported and the traversal runs on whatever the page shows.
 */

export interface ListingFilters {
  categories: readonly string[];
  minDiscountPercent?: number;
  sortByDiscount: boolean;
}

/** Clicks the first candidate selector that matches; false when none does. */
export interface ListingControls {
  click(candidates: readonly string[]): Promise<boolean>;
}

export type FilterStep = 'categories' | 'discount' | 'sort';

export interface FilterStepOutcome {
  step: FilterStep;
  status: 'applied' | 'not-found' | 'failed';
  detail: string;
}

export interface ApplyFiltersOptions {
  settleMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const FILTER_BAR = 'xpath=/html/body/div[1]/div[1]/div/div/div[3]/section/div/div/div/div/div[1]/div[2]';

const KNOWN_CATEGORY_OPTIONS: Record<string, string> = {
  'IT関連機器': `${FILTER_BAR}/div[1]/div[2]/div[2]/fieldset/div[3]`,
  '医療用品・消耗品': `${FILTER_BAR}/div[1]/div[2]/div[2]/fieldset/div[5]`,
  '日用品・食品・飲料': `${FILTER_BAR}/div[1]/div[2]/div[2]/fieldset/div[7]`
};

/** Candidate selectors per control, most specific first. */
export const FILTER_CONTROLS = {
  categoryDropdown: [`${FILTER_BAR}/div[1]/div[1]/span/span/input`],
  categoryOption: (label: string): string[] => {
    const known = KNOWN_CATEGORY_OPTIONS[label];
    const byText = `fieldset >> text=${JSON.stringify(label)}`;
    return known ? [byText, known] : [byText];
  },
  categoryApply: [`${FILTER_BAR}/div[1]/div[2]/div[3]/div[2]/span/span`],
  discountDropdown: [`${FILTER_BAR}/div[2]/div[1]/span/span/input`],
  discountOption: (percent: number): string[] => {
    const byText = `fieldset >> text=/^\\s*${percent}\\s*%/`;
    return percent === 5 ? [byText, `${FILTER_BAR}/div[2]/div[2]/div[2]/fieldset/div[1]`] : [byText];
  },
  discountApply: [`${FILTER_BAR}/div[2]/div[2]/div[4]/div[2]/span/span/input`],
  sortDropdown: [`${FILTER_BAR}/span/span/span/span/span/span[1]`],
  sortOption: ['xpath=/html/body/div[3]/div/div/ul/li[3]/a']
};

export class ControlNotFoundError extends Error {
  constructor(readonly control: string) {
    super(`${control} not found`);
    this.name = 'ControlNotFoundError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function requireClick(controls: ListingControls, control: string, candidates: readonly string[]): Promise<void> {
  if (!(await controls.click(candidates))) {
    throw new ControlNotFoundError(control);
  }
}

async function runStep(step: FilterStep, body: () => Promise<string>): Promise<FilterStepOutcome> {
  try {
    return { step, status: 'applied', detail: await body() };
  } catch (error) {
    if (error instanceof ControlNotFoundError) {
      return { step, status: 'not-found', detail: error.message };
    }
    return { step, status: 'failed', detail: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Applies the configured steps in order (categories, discount, sort) and
 * reports each one. Steps that are not configured are left out of the report.
 */
export async function applyListingFilters(
  controls: ListingControls,
  filters: ListingFilters,
  options: ApplyFiltersOptions = {}
): Promise<FilterStepOutcome[]> {
  const settleMs = options.settleMs ?? 2000;
  const wait = options.sleep ?? sleep;
  const outcomes: FilterStepOutcome[] = [];

  if (filters.categories.length > 0) {
    outcomes.push(
      await runStep('categories', async () => {
        await requireClick(controls, 'category dropdown', FILTER_CONTROLS.categoryDropdown);
        const missing: string[] = [];
        for (const label of filters.categories) {
          if (!(await controls.click(FILTER_CONTROLS.categoryOption(label)))) {
            missing.push(label);
          }
        }
        if (missing.length === filters.categories.length) {
          throw new ControlNotFoundError(`category ${missing.join(', ')}`);
        }
        await requireClick(controls, 'category apply button', FILTER_CONTROLS.categoryApply);
        await wait(settleMs);
        const selected = filters.categories.filter(label => !missing.includes(label));
        return missing.length > 0
          ? `${selected.join(', ')} (not found: ${missing.join(', ')})`
          : selected.join(', ');
      })
    );
  }

  const minDiscount = filters.minDiscountPercent;
  if (minDiscount !== undefined) {
    outcomes.push(
      await runStep('discount', async () => {
        await requireClick(controls, 'discount dropdown', FILTER_CONTROLS.discountDropdown);
        await requireClick(controls, `${minDiscount}% discount option`, FILTER_CONTROLS.discountOption(minDiscount));
        await requireClick(controls, 'discount apply button', FILTER_CONTROLS.discountApply);
        await wait(settleMs);
        return `${minDiscount}%+`;
      })
    );
  }

  if (filters.sortByDiscount) {
    outcomes.push(
      await runStep('sort', async () => {
        await requireClick(controls, 'sort dropdown', FILTER_CONTROLS.sortDropdown);
        await requireClick(controls, 'business discount sort option', FILTER_CONTROLS.sortOption);
        await wait(settleMs);
        return 'business discount, descending';
      })
    );
  }

  return outcomes;
}
