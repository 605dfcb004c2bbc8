export {
  buildRoutingRules,
  isApiPath,
  routingRuleInputSchema,
  API_PATH_PREFIX,
  UPSTREAM_IDLE_TIMEOUT_MS,
  type RoutingRuleSet,
  type RoutingRuleInput,
  type ApiRoute,
  type StaticRoute,
} from './config/routing-rules';
export { renderCaddyfile, compileCaddyfileTemplate, formatDuration } from './services/ProxyConfigGenerator';
export {
  ReverseProxy,
  createLoadBalancerApp,
  runLoadBalancer,
  type RunLoadBalancerOptions,
} from './services/ReverseProxy';
