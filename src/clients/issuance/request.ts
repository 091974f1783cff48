import type { CertificateSpec } from '../../api/v1alpha1/index.js';
import type { IssueRequest, IssueSubject } from './types.js';

function nonEmpty<T extends string | readonly string[]>(value: T | undefined): value is T {
  return value !== undefined && value.length > 0;
}

/**
 * Creation request for a Certificate's subject, SANs and template. Empty
 * fields are left out of the body; `subject` and `san` are always sent.
 */
export function issueRequestFromSpec(spec: CertificateSpec): IssueRequest {
  const { subject = {}, san = {}, template } = spec.certificateData;

  const wireSubject: IssueSubject = {
    ...(nonEmpty(subject.commonName) && { commonName: subject.commonName }),
    ...(nonEmpty(subject.country) && { country: subject.country }),
    ...(nonEmpty(subject.state) && { state: subject.state }),
    ...(nonEmpty(subject.locality) && { locality: subject.locality }),
    ...(nonEmpty(subject.organization) && { organization: subject.organization }),
    ...(nonEmpty(subject.organizationUnit) && { organizationalUnit: subject.organizationUnit }),
  };

  return {
    subject: wireSubject,
    san: {
      ...(nonEmpty(san.dns) && { dns: san.dns }),
      ...(nonEmpty(san.ips) && { ips: san.ips }),
    },
    ...(nonEmpty(template) && { template }),
  };
}
