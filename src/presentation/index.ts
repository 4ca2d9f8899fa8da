export * from './catalog-results-layout';
export * from './command-line';
export * from './document-link-controller';
export * from './keyboard-shortcuts';
export * from './man-viewer-app';
export * from './plain-text-view';
export * from './scrollbar-controller';
