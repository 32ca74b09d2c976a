/**
 * Environment enumeration
 *
 * Shared enum for application environment types to avoid circular dependencies.
 */
export enum Environment {
  Development = "development",
  Production = "production",
  Test = "test",
}
