export * from './ascii-case';
export * from './character-translator';
export * from './document-content';
export * from './geometry';
export * from './man-page';
export * from './overstrike';
