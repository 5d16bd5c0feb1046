/** 敏感判定的來源類別，依評估順序排列 */
export type SensitivityCategory = 'directory' | 'filename-pattern' | 'extension';

export interface SensitivityVerdict {
  isSensitive: boolean;
  reason?: string;
  category?: SensitivityCategory;
}

export const NOT_SENSITIVE: SensitivityVerdict = Object.freeze({ isSensitive: false });

export function sensitive(reason: string, category: SensitivityCategory): SensitivityVerdict {
  return { isSensitive: true, reason, category };
}
