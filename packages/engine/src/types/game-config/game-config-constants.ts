export const defaultRows = 6;
export const defaultColumns = 7;
export const defaultRunLength = 4;
