export class SecurityService {
  /**
   * Mask a credential for log output - keep the first and last four
   * characters when the value is long enough to spare them.
   */
  static maskSecret(value: string | undefined): string {
    if (!value) {
      return '(unset)';
    }

    if (value.length <= 12) {
      return '*'.repeat(value.length);
    }

    return `${value.slice(0, 4)}****${value.slice(-4)}`;
  }
}
