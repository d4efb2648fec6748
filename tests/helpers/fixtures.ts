import { PauseSwitch, RoleRegistry } from "../../src/access/roles.js";
import type { CampaignEvent } from "../../src/crowdfunding/events.js";
import { CrowdfundingPlatform } from "../../src/crowdfunding/platform.js";
import type { CreateCampaignInput, PlatformConfig } from "../../src/crowdfunding/types.js";
import { InMemoryTokenVault } from "../../src/token/memory.js";
import { FakeClock } from "./clock.js";
import { makeKeypair, pubkey } from "./participants.js";

export const DAY = 86_400;
export const START = 1_000_000;
export const END = START + 7 * DAY;
/** Default refund grace period */
export const GRACE = 30 * DAY;

export function setupPlatform(config?: Partial<PlatformConfig>) {
  const owner = pubkey(makeKeypair(1));
  const admin = pubkey(makeKeypair(2));
  const creator = pubkey(makeKeypair(3));
  const donorA = pubkey(makeKeypair(10));
  const donorB = pubkey(makeKeypair(11));
  const outsider = pubkey(makeKeypair(20));
  const token = pubkey(makeKeypair(50));
  const otherToken = pubkey(makeKeypair(51));

  const clock = new FakeClock(START);
  const roles = new RoleRegistry(owner, [admin]);
  const pauseSwitch = new PauseSwitch(roles);
  const vault = new InMemoryTokenVault();
  vault.registerToken(token);
  vault.registerToken(otherToken);
  for (const holder of [donorA, donorB]) {
    vault.mint(token, holder, 10_000n);
    vault.mint(otherToken, holder, 10_000n);
  }

  const events: CampaignEvent[] = [];
  const platform = new CrowdfundingPlatform({
    clock,
    access: roles,
    pause: pauseSwitch,
    tokenRegistry: vault,
    transfers: vault,
    config,
    listeners: [(event) => events.push(event)]
  });

  function createCampaign(overrides: Partial<CreateCampaignInput> = {}): number {
    return platform.createCampaign(creator, {
      startTime: START,
      endTime: END,
      name: "Community garden",
      description: "Raised beds for the east lot",
      url: "https://example.org/garden",
      imageUrl: "https://example.org/garden.png",
      fundingGoal: 1_000n,
      fundingModel: "all_or_nothing",
      token,
      ...overrides
    });
  }

  return {
    owner,
    admin,
    creator,
    donorA,
    donorB,
    outsider,
    token,
    otherToken,
    clock,
    roles,
    pauseSwitch,
    vault,
    events,
    platform,
    createCampaign
  };
}
