export * from './account';
export * from './accountActivities';
export * from './accountConfiguration';
export * from './assets';
export * from './calendar';
export * from './clock';
export * from './marketData';
export * from './orders';
export * from './portfolioHistory';
export * from './positions';
export * from './watchlist';
