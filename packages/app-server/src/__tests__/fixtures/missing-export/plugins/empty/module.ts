export const something = { name: 'not-a-blueprint' };
