export const generateId = (prefix: string): string => {
  if (typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function') {
    return `${prefix}_${crypto.randomUUID().replace(/-/g, '')}`;
  }
  // Fallback for older browsers/environments
  return `${prefix}_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 11)}`;
};

export const generateReportId = () => generateId('report');
export const generateItemId = () => generateId('item');
export const generatePhotoId = () => generateId('photo');
export const generateContactId = () => generateId('contact');
export const generateUserId = () => generateId('user');
