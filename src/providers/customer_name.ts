export const DEFAULT_CUSTOMER_NAME = "Client";

/**
 * Normalizes an extracted first name, or returns null when it does not look like one
 * (digits, too short, more than one word).
 */
export function cleanName(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const name = raw.trim().replace(/^[.,!?:;"']+|[.,!?:;"']+$/g, "");
  if (!/^[A-Za-zÀ-ÿ'-]{2,30}$/.test(name)) return null;
  return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

export function firstNameFromContact(contactName: string | null | undefined): string | null {
  if (!contactName) return null;
  const [first] = contactName.trim().split(/\s+/);
  return cleanName(first);
}
