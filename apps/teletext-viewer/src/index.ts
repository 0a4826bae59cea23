export * from './lib/config.js';
export * from './lib/errors.js';
export * from './lib/logger.js';
export * from './protocol/types.js';
export * from './protocol/pageId.js';
export { decodeMarkup, decodeEntities, parseColor, type DecodeOptions } from './protocol/markup.js';
export * from './transport/pageTransport.js';
export * from './page/types.js';
export { detectPageReferences, type PageReference } from './page/links.js';
export { parsePage } from './page/parser.js';
export * from './page/store.js';
export * from './page/inFlight.js';
export * from './page/cache.js';
export { createPageLoader } from './page/loader.js';
export * from './navigation/history.js';
export * from './navigation/state.js';
export * from './navigation/pageNumberInput.js';
export * from './navigation/controller.js';
export * from './viewer/createViewer.js';
export { useNavigationSnapshot } from './hooks/useNavigationSnapshot.js';
