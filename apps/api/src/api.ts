import { HttpApi } from "@effect/platform";
import { HealthGroup } from "./health/api.js";
import { RewardFlightsGroup } from "./reward-flights/api.js";

export class Api extends HttpApi.make("Api")
  .add(RewardFlightsGroup)
  .add(HealthGroup) {}
