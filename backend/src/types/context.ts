import { Database } from '../config/database';
import { AppConfig } from '../config/environment';
import { RecommendationLookup } from '../services/recommendation.service';

// Everything a request handler may reach; built once at startup
export interface AppContext {
  config: AppConfig;
  db: Database;
  recommender: RecommendationLookup;
}
