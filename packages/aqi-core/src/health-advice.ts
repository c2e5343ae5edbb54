/**
 * Activity advice for sensitive population groups.
 */

import { AqiCategory } from '@airwatch/contracts';
import { classifyIndex } from './classifier.js';

export type HealthGroupId = 'athletes' | 'children' | 'elderly' | 'asthmatics';

export type RiskLevel = 'low' | 'moderate' | 'high' | 'very-high';

export interface HealthGroup {
  id: HealthGroupId;
  name: string;
  description: string;
  /** Highest index still considered low risk for this group */
  threshold: number;
  recommendations: Record<AqiCategory, string>;
}

export interface GroupAdvice {
  group: HealthGroupId;
  name: string;
  riskLevel: RiskLevel;
  recommendation: string;
}

export const HEALTH_GROUPS: readonly HealthGroup[] = [
  {
    id: 'athletes',
    name: 'Athletes',
    description: 'Recommendations for sport and exercise based on air quality',
    threshold: 100,
    recommendations: {
      [AqiCategory.Good]: 'Ideal conditions for all outdoor training.',
      [AqiCategory.Moderate]: 'Fine for most activities. Take breaks if you feel discomfort.',
      [AqiCategory.UnhealthyForSensitiveGroups]: 'Limit intense training. Prefer indoor venues.',
      [AqiCategory.Unhealthy]: 'Avoid outdoor training. Use gyms and indoor facilities.',
      [AqiCategory.VeryUnhealthy]: 'Train indoors only, in filtered air.',
      [AqiCategory.Hazardous]: 'Cancel all outdoor activity. Stay indoors.',
    },
  },
  {
    id: 'children',
    name: 'Children',
    description: 'Protecting children from air pollution',
    threshold: 75,
    recommendations: {
      [AqiCategory.Good]: 'Children can play outside freely.',
      [AqiCategory.Moderate]: 'Most children can play outside; watch those with respiratory problems.',
      [AqiCategory.UnhealthyForSensitiveGroups]: 'Limit time outdoors for all children. Short walks are fine.',
      [AqiCategory.Unhealthy]: 'Children should stay indoors and avoid outdoor activity.',
      [AqiCategory.VeryUnhealthy]: 'Keep all children indoors with windows closed and air purifiers on.',
      [AqiCategory.Hazardous]: 'Keep children indoors. Wear a mask if going out is unavoidable.',
    },
  },
  {
    id: 'elderly',
    name: 'Elderly',
    description: 'Advice for adults over 65 and people with chronic illness',
    threshold: 75,
    recommendations: {
      [AqiCategory.Good]: 'Safe for all outdoor activity, walks and gardening.',
      [AqiCategory.Moderate]: 'Limit strenuous outdoor activity. Short walks are fine.',
      [AqiCategory.UnhealthyForSensitiveGroups]: 'Stay indoors if you have heart or lung disease.',
      [AqiCategory.Unhealthy]: 'Stay indoors and avoid all outdoor activity.',
      [AqiCategory.VeryUnhealthy]: 'Stay indoors with windows closed. Contact a doctor if symptoms appear.',
      [AqiCategory.Hazardous]: 'Stay indoors. Call a doctor if you feel symptoms.',
    },
  },
  {
    id: 'asthmatics',
    name: 'Asthmatics',
    description: 'Advice for people with asthma and respiratory conditions',
    threshold: 50,
    recommendations: {
      [AqiCategory.Good]: 'Safe for all activities. Keep taking medication as prescribed.',
      [AqiCategory.Moderate]: 'Take care during physical activity and keep an inhaler at hand.',
      [AqiCategory.UnhealthyForSensitiveGroups]: 'Limit outdoor activity. Adjust medication if advised.',
      [AqiCategory.Unhealthy]: 'Stay indoors, use your inhaler as prescribed and contact your doctor.',
      [AqiCategory.VeryUnhealthy]: 'Stay indoors with rescue medication ready. Call your doctor.',
      [AqiCategory.Hazardous]: 'Stay indoors, keep emergency medication ready, call emergency services if needed.',
    },
  },
];

/**
 * Up to 100 the group's threshold decides between low and moderate.
 */
export function getRiskLevel(index: number, threshold: number): RiskLevel {
  if (index <= 50) return 'low';
  if (index <= 100) return index <= threshold ? 'low' : 'moderate';
  if (index <= 150) return 'moderate';
  if (index <= 200) return 'high';
  return 'very-high';
}

/**
 * Advice for every group at the given index.
 *
 * @example
 * ```typescript
 * getHealthAdvice(80).map((a) => `${a.group}:${a.riskLevel}`);
 * // ['athletes:low', 'children:moderate', 'elderly:moderate', 'asthmatics:moderate']
 * ```
 */
export function getHealthAdvice(index: number): GroupAdvice[] {
  const { category } = classifyIndex(index);
  return HEALTH_GROUPS.map((group) => ({
    group: group.id,
    name: group.name,
    riskLevel: getRiskLevel(index, group.threshold),
    recommendation: group.recommendations[category],
  }));
}
