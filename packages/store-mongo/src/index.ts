export { buildMatch, compilePlan, compileSample, toDouble, SORT_KEY } from './compile';
export { MongoStore, type MongoStoreConfig } from './store';
