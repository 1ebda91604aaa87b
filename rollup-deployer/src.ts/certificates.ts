import * as fs from "fs";
import * as path from "path";

import { ConfigurationError } from "./errors";

export interface CertificateBundle {
  clientCert: string;
  clientKey: string;
  caCert?: string;
}

export interface CertificateProvider {
  getCertificates(orgId: string): Promise<CertificateBundle>;
}

export const CLIENT_CERT_FILE = "client.crt";
export const CLIENT_KEY_FILE = "client.key";
export const CA_CERT_FILE = "ca.crt";

export function hasCredentials(bundle: CertificateBundle | undefined): bundle is CertificateBundle {
  return !!bundle && bundle.clientCert.length > 0 && bundle.clientKey.length > 0;
}

function readOptional(filePath: string): string {
  return fs.existsSync(filePath) ? fs.readFileSync(filePath, "utf-8") : "";
}

// Missing files read as empty strings; the caller decides whether that is fatal
export function readCertificateBundle(dir: string): CertificateBundle {
  const bundle: CertificateBundle = {
    clientCert: readOptional(path.join(dir, CLIENT_CERT_FILE)),
    clientKey: readOptional(path.join(dir, CLIENT_KEY_FILE)),
  };
  const caCert = readOptional(path.join(dir, CA_CERT_FILE));
  if (caCert) {
    bundle.caCert = caCert;
  }
  return bundle;
}

/** Serves `<baseDir>/<orgId>/{client.crt, client.key, ca.crt}`. */
export class DirectoryCertificateProvider implements CertificateProvider {
  constructor(private readonly baseDir: string) {}

  async getCertificates(orgId: string): Promise<CertificateBundle> {
    if (!/^[A-Za-z0-9_-]+$/.test(orgId)) {
      throw new ConfigurationError(`invalid organization id: ${orgId}`, "org_id");
    }
    return readCertificateBundle(path.join(this.baseDir, orgId));
  }
}
