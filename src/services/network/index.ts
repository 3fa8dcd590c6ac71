export { createNetworkService } from './service';
