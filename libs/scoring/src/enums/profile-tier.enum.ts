export enum ProfileTier {
  Basic = 'Basic',
  Standard = 'Standard',
  Premium = 'Premium',
  Elite = 'Elite',
}
