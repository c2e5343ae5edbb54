/**
 * @fileoverview AQI health-advisory categories.
 *
 * Six ordered categories with fixed upper boundaries at 50/100/150/200/300.
 * Everything above 300 is Hazardous.
 *
 * @module @airwatch/contracts/categories
 */

/**
 * Health-advisory category for an overall AQI value.
 *
 * @invariant Declaration order is severity order (Good is least severe)
 */
export enum AqiCategory {
  Good = 'Good',
  Moderate = 'Moderate',
  UnhealthyForSensitiveGroups = 'Unhealthy for Sensitive Groups',
  Unhealthy = 'Unhealthy',
  VeryUnhealthy = 'Very Unhealthy',
  Hazardous = 'Hazardous',
}
