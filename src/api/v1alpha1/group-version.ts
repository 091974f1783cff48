export const GROUP = 'certops.io';
export const VERSION = 'v1alpha1';
export const API_VERSION = `${GROUP}/${VERSION}`;

export const CERTIFICATE_KIND = 'Certificate';
export const CERTIFICATE_PLURAL = 'certificates';

export const CERTIFICATE_CONFIG_KIND = 'CertificateConfig';
export const CERTIFICATE_CONFIG_PLURAL = 'certificateconfigs';
