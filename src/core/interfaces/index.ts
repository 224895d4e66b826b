/**
 * Central export point for all core interfaces
 */

export * from './IProbeClient';
export * from './IPassiveDetector';
export * from './IReporter';
