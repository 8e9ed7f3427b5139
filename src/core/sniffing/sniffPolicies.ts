// src/core/sniffing/sniffPolicies.ts

import { type AnimationSniffPolicy, SupportedSniffPolicies } from '../../@types/index.js';
import { AlwaysAnimatedPolicy } from './policies/AlwaysAnimatedPolicy.js';
import { GifFrameCountPolicy } from './policies/GifFrameCountPolicy.js';
import { WebpContainerHeaderPolicy } from './policies/WebpContainerHeaderPolicy.js';

/**
 * Mapping of policy identifiers to their implementations.
 */
export const SniffPolicyMap: Record<SupportedSniffPolicies, AnimationSniffPolicy> = {
    [SupportedSniffPolicies.AlwaysAnimated]: new AlwaysAnimatedPolicy(),
    [SupportedSniffPolicies.WebpContainerHeader]: new WebpContainerHeaderPolicy(),
    [SupportedSniffPolicies.GifFrameCount]: new GifFrameCountPolicy(),
};
