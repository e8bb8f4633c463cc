import { Injectable } from '@nestjs/common';
import {
  NormalizedGithubProfile,
  NormalizedLeetcodeProfile,
  ProfileFacts,
} from '../interfaces/normalized-profile.interface';

export const CAREER_ADVICE_TITLE = 'Career Advice';
export const GRIND_PLAN_TITLE = 'Grind Plan';

/**
 * Builds the instruction block handed to the downstream generation agent.
 * Output depends only on the record, so identical facts give identical text.
 */
@Injectable()
export class InstructionSynthesizerService {
  forGithub(facts: ProfileFacts<NormalizedGithubProfile>): string {
    const displayName = facts.name ? `${facts.name} (@${facts.username})` : `@${facts.username}`;

    const lines = [
      `${displayName} has ${facts.publicRepos} public repositories with ${facts.totalStars} total stars ` +
        `(${facts.forkedRepos} of them forks), ${facts.followers} followers and follows ${facts.following} accounts. ` +
        `The account is ${facts.accountAgeDays} days old and was last active ${facts.daysSinceLastActivity} days ago.`,
    ];

    if (facts.bio) {
      lines.push(`Their bio reads: "${facts.bio}".`);
    }

    lines.push(
      facts.topLanguages.length > 0
        ? `Their most used languages are ${facts.topLanguages.join(', ')}.`
        : 'None of their repositories declare a primary language.',
    );

    lines.push(
      facts.twitterUsername
        ? `They also post on Twitter as @${facts.twitterUsername}; praise or critique that presence alongside their code.`
        : 'They have no Twitter account linked, so point out how quietly they ship.',
    );

    lines.push(
      '',
      'Task:',
      '1. Write a witty, creative roast of this developer grounded in the numbers above.',
      `2. Then add a section titled "${CAREER_ADVICE_TITLE}" with three concrete ways to level up their GitHub profile.`,
    );

    return lines.join('\n');
  }

  forLeetcode(facts: ProfileFacts<NormalizedLeetcodeProfile>): string {
    return [
      `LeetCode user ${facts.username} is ranked ${facts.ranking} with ${facts.reputation} reputation. ` +
        `They have solved ${facts.totalSolved} problems (Easy: ${facts.easySolved}, Medium: ${facts.mediumSolved}, ` +
        `Hard: ${facts.hardSolved}) with an acceptance rate of ${facts.acceptanceRate.toFixed(2)}%.`,
      '',
      'Task:',
      '1. Critique their problem-solving record honestly, calling out the weakest difficulty tier.',
      `2. Then add a section titled "${GRIND_PLAN_TITLE}" with a week-by-week practice plan to improve it.`,
    ].join('\n');
  }
}
