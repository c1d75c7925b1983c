export enum RiskLevel {
  VeryLow = 'Very Low Risk',
  Low = 'Low Risk',
  Medium = 'Medium Risk',
  High = 'High Risk',
  VeryHigh = 'Very High Risk',
}
