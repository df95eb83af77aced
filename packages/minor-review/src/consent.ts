import { CONSENT_CHECK, postSignedJson, type Logger } from '@safeguard/shared';

export interface ConsentSettings {
  /** Consent attestation endpoint. Absent means every check answers "no consent". */
  checkUrl: string | null;
  /** Shared HMAC secret. Absent means every check answers "no consent". */
  secret: string | null;
  timeoutMs?: number;
}

export interface ConsentChecker {
  checkParentalConsent(accountIdentifier: string | null): Promise<boolean>;
}

function readExistFlag(body: string): boolean | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return false;
  return 'exist' in data && Boolean(data.exist);
}

/**
 * Asks the consent attestation service whether a parental consent form is on
 * file for an account. Fails closed: any problem answers `false`, nothing throws.
 */
export class ConsentVerifier implements ConsentChecker {
  constructor(
    private readonly settings: ConsentSettings,
    private readonly logger: Logger,
  ) {}

  async checkParentalConsent(accountIdentifier: string | null): Promise<boolean> {
    if (!accountIdentifier) {
      return false;
    }

    const { checkUrl, secret } = this.settings;
    if (!checkUrl) {
      this.logger.warn('Consent check URL not set; consent check skipped.');
      return false;
    }
    if (!secret) {
      this.logger.warn('Consent check secret not set; consent check skipped.');
      return false;
    }

    const result = await postSignedJson(
      checkUrl,
      { file_name: accountIdentifier },
      {
        secret,
        timeoutMs: this.settings.timeoutMs ?? CONSENT_CHECK.TIMEOUT_MS,
        signatureHeader: CONSENT_CHECK.SIGNATURE_HEADER,
        algorithm: CONSENT_CHECK.SIGNATURE_ALGORITHM,
      },
    );

    if (result.kind === 'timeout') {
      this.logger.warn(`Consent check timed out for ${accountIdentifier}: ${result.error}`);
      return false;
    }
    if (result.kind === 'transport_error') {
      this.logger.warn(`Consent check request failed for ${accountIdentifier}: ${result.error}`);
      return false;
    }

    this.logger.info(`Consent check response for ${accountIdentifier}: status=${result.status}`);
    if (result.status !== 200) {
      return false;
    }

    const exist = readExistFlag(result.body);
    if (exist === null) {
      this.logger.warn(`Consent check returned a non-JSON body for ${accountIdentifier}`);
      return false;
    }
    return exist;
  }
}
