import { formatScore } from './utils';
import type { BenchmarkPosition, Recommendation, ReportResult } from './types';

const PRIORITY_LABEL = { high: 'High', medium: 'Medium', low: 'Low' } as const;

const POSITION_LABEL: Record<BenchmarkPosition, string> = {
  below_average: 'Below average',
  above_average: 'Above average',
  top_quartile: 'Top quartile',
  best_in_class: 'Best in class',
};

function renderRecommendation(rec: Recommendation): string {
  if (rec.kind === 'not_scoreable') {
    return `- **${rec.area_name}**: not scored (${rec.reason})\n`;
  }

  let md = `### ${rec.rank}. ${rec.area_name} (${rec.section_name})\n\n`;
  md += `- Current score: **${formatScore(rec.area_score, 2)}** (level ${rec.current_level} → ${rec.target_level})\n`;
  md += `- Priority: ${PRIORITY_LABEL[rec.priority]}\n`;
  md += `- Estimated timeline: ${rec.estimated_timeline || '-'}\n\n`;

  if (!rec.guidance) {
    md += `_No progression guidance is available for this step._\n\n`;
    return md;
  }

  const { prerequisites, action_items, success_metrics, common_pitfall } = rec.guidance;
  if (prerequisites.length > 0) {
    md += `**Prerequisites**\n\n`;
    prerequisites.forEach(p => { md += `- ${p}\n`; });
    md += `\n`;
  }
  if (action_items.length > 0) {
    md += `**Action items**\n\n`;
    action_items.forEach(group => {
      if (group.category) {
        md += `- ${group.category}\n`;
        group.items.forEach(item => { md += `  - ${item}\n`; });
      } else {
        group.items.forEach(item => { md += `- ${item}\n`; });
      }
    });
    md += `\n`;
  }
  if (success_metrics.length > 0) {
    md += `**Success metrics**\n\n`;
    success_metrics.forEach(m => { md += `- ${m}\n`; });
    md += `\n`;
  }
  if (common_pitfall) {
    md += `**Common pitfall:** ${common_pitfall}\n\n`;
  }
  return md;
}

/**
 * Downloadable Markdown version of a report
 */
export function renderMarkdownReport(report: ReportResult): string {
  let md = `# ${report.assessment_name} Maturity Assessment Report\n\n`;
  md += `**Generated:** ${report.generated_at}\n\n`;

  md += `## 1. Overall Result\n\n`;
  if (report.status === 'not_scoreable') {
    md += `This assessment could not be scored: ${report.not_scoreable_reason ?? 'no usable responses'}.\n\n`;
  }
  md += `| Metric | Value |\n`;
  md += `| :--- | :---: |\n`;
  md += `| Overall score | **${formatScore(report.overall_score, 2)}** / 4.00 |\n`;
  md += `| Maturity tier | ${report.classification?.label ?? '-'} |\n`;
  md += `| Questions answered | ${report.completion.answered} / ${report.completion.total_questions} (${report.completion.percentage}%) |\n`;
  if (report.improvement_potential?.next_tier_label) {
    md += `| Gap to ${report.improvement_potential.next_tier_label} | ${formatScore(report.improvement_potential.gap_to_next_tier, 2)} |\n`;
  }
  md += `\n`;

  if (report.tier_details) {
    md += `**${report.tier_details.name}**: ${report.tier_details.description}\n\n`;
  }

  const { summary, roadmap } = report;
  if (summary.total_count > 0) {
    md += `**Recommendations:** ${summary.total_count} (${summary.by_priority.high} high, ${summary.by_priority.medium} medium, ${summary.by_priority.low} low)\n\n`;
  }
  if (roadmap) {
    const immediate = roadmap.immediate_actions.recommendations;
    if (immediate.length > 0) {
      md += `**Immediate actions (${roadmap.immediate_actions.estimated_duration}):** ${immediate.map(r => r.area_name).join(', ')}\n\n`;
    }
    if (roadmap.target_state) {
      md += `**Target:** ${roadmap.target_state.label} (score ${formatScore(roadmap.target_state.target_score, 2)}, ${roadmap.target_state.estimated_timeline})\n\n`;
    }
  }

  md += `## 2. Section Scores\n\n`;
  md += `| Section | Score | Coverage | Industry average | Position |\n`;
  md += `| :--- | :---: | :---: | :---: | :--- |\n`;
  report.sections.forEach(s => {
    const position = s.benchmark_position ? POSITION_LABEL[s.benchmark_position] : '-';
    md += `| ${s.section_name} | ${formatScore(s.score, 2)} | ${Math.round(s.coverage * 100)}% | ${formatScore(s.benchmark.industry_average, 2)} | ${position} |\n`;
  });
  if (report.section_spread) {
    md += `\nSection consistency: ${report.section_spread.consistency} (variance ${report.section_spread.variance})\n`;
  }

  if (report.strengths.length > 0 || report.weaknesses.length > 0) {
    md += `\n## 3. Strengths and Weaknesses\n\n`;
    md += `### Strengths (Top ${report.strengths.length})\n\n`;
    report.strengths.forEach(s => {
      md += `${s.rank}. **${s.area_name}** (score: ${formatScore(s.mean, 2)})\n`;
    });
    md += `\n### Needs Improvement (Bottom ${report.weaknesses.length})\n\n`;
    report.weaknesses.forEach(w => {
      md += `${w.rank}. **${w.area_name}** (score: ${formatScore(w.mean, 2)})\n`;
    });
  }

  const steps = report.recommendations.filter(r => r.kind === 'next_step');
  const unscored = report.recommendations.filter(r => r.kind === 'not_scoreable');
  if (steps.length > 0) {
    md += `\n## 4. Steps to the Next Level\n\n`;
    steps.forEach(r => { md += renderRecommendation(r); });
  }
  if (unscored.length > 0) {
    md += `\n## 5. Areas Not Scored\n\n`;
    unscored.forEach(r => { md += renderRecommendation(r); });
  }

  md += `\n---\n\n`;
  md += `*Scoring version ${report.scoring_version}.*\n`;
  return md;
}

export function reportFileName(report: ReportResult): string {
  const safeName = report.assessment_name.replace(/[\/\\:*?"<>|\s]+/g, '_');
  return `${safeName}_maturity_report_${report.generated_at.slice(0, 10)}.md`;
}
