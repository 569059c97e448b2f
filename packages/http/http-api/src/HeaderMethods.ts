import { PlatformHeader } from './PlatformHeader';

/**
 * HeaderMethods - stateless helpers for working with platform headers.
 *
 * Used by the dispatch proxy to pick the headers it forwards and to mask
 * secured values before they reach a log line.
 */
export class HeaderMethods {
    /**
     * Headers with isWantTransferred=true.
     */
    findTransferHeaders(headers: readonly PlatformHeader[]): PlatformHeader[] {
        return headers.filter((h) => h.isWantTransferred);
    }

    /**
     * Lower-cased names of the headers with isSecured=true.
     */
    secureHeaderNames(headers: readonly PlatformHeader[]): Set<string> {
        return new Set(headers.filter((h) => h.isSecured).map((h) => h.headerName.toLowerCase()));
    }

    /**
     * Copy of `headers` for logging, with every secured header masked.
     * Header names are matched case-insensitively.
     */
    buildSecureMapForLogs(
        headers: Readonly<Record<string, string>>,
        secureNames: ReadonlySet<string>,
    ): Record<string, string> {
        const result: Record<string, string> = {};
        for (const [name, value] of Object.entries(headers)) {
            result[name] = secureNames.has(name.toLowerCase()) ? this.maskSecureValue(value) : value;
        }
        return result;
    }

    /**
     * Masking rules for secured values:
     * - Length > 15: first 3 and last 3 characters with "..." between
     * - Length 8-15: first 2 characters with "..."
     * - Length < 8: "<secure key too short to log>"
     */
    maskSecureValue(value: string): string {
        const len = value.length;

        if (len < 8) {
            return '<secure key too short to log>';
        } else if (len <= 15) {
            return `${value.substring(0, 2)}...`;
        } else {
            return `${value.substring(0, 3)}...${value.substring(len - 3)}`;
        }
    }
}
