/**
 * Template helpers — name conversions used by the code template.
 */

/** `parent_folder` → `ParentFolder`; each word is title-cased, the rest lowered. */
export function camelcase(s: string): string {
  return s
    .trim()
    .split(/[-_ ]+/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join('');
}

/** `tenant/user#member` → `user` */
export function extractType(fullType: string): string {
  const parts = fullType.split('/');
  let typeName = parts.length > 1 ? parts[1] : fullType;
  const hash = typeName.indexOf('#');
  if (hash !== -1) typeName = typeName.slice(0, hash);
  return typeName;
}

/** `tenant/group#member` → `{ objectType: 'tenant/group', relation: 'member' }` */
export function splitSubject(fullType: string): { objectType: string; relation?: string } {
  const hash = fullType.indexOf('#');
  if (hash === -1) return { objectType: fullType };
  return { objectType: fullType.slice(0, hash), relation: fullType.slice(hash + 1) };
}

export interface TemplateHelpers {
  camelcase: (s: string) => string;
  extractType: (fullType: string) => string;
  splitSubject: (fullType: string) => { objectType: string; relation?: string };
}

export const defaultHelpers: TemplateHelpers = {
  camelcase,
  extractType,
  splitSubject,
};
