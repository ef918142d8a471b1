// Uppercase hex, zero-padded to `width` digits
export const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, '0');
