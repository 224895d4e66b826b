import { RECOMMENDATION_CHECKLIST, RecommendationRule } from '../config/constants';
import { FindingCategory } from '../types/enums';
import { Finding } from '../types/finding';

/**
 * RecommendationEngine - Static hardening checklist.
 * The checklist is the same for every report; action items are the entries
 * tied to a category that actually shows up in the findings.
 */
export class RecommendationEngine {
  private readonly checklist: readonly RecommendationRule[];

  constructor(checklist: readonly RecommendationRule[] = RECOMMENDATION_CHECKLIST) {
    this.checklist = checklist;
  }

  public generate(_findings: readonly Finding[] = []): string[] {
    return this.checklist.map((rule) => rule.text);
  }

  public actionItems(findings: readonly Finding[]): string[] {
    const present = new Set<FindingCategory>(findings.map((finding) => finding.category));
    return this.checklist
      .filter((rule) => rule.categories.some((category) => present.has(category)))
      .map((rule) => rule.text);
  }
}
