/**
 * Passive detectors
 */

export * from './HeaderSecurityDetector';
export * from './CookieSecurityDetector';
export * from './FileExposureDetector';
export * from './HtmlContentDetector';
export * from './InsecureTransmissionDetector';
export * from './InformationDisclosureDetector';
