import { generateGaps, rankGaps } from '../gapGenerator';
import { SkillPair } from '../../interfaces/domain/MatchResult';

const skill = (name: string) => ({ name, canonical: true });

const importance = new Map([
  ['docker', 1.5],
  ['aws', 1.5],
  ['sql', 2],
  ['communication', 0.8]
]);

const missing = ['graphql', 'docker', 'communication', 'aws'].map(skill);

const matched: SkillPair[] = [
  { jdSkill: skill('kubernetes'), resumeSkill: skill('docker swarm'), similarity: 0.8 },
  { jdSkill: skill('python'), resumeSkill: skill('python'), similarity: 1 },
  { jdSkill: skill('sql'), resumeSkill: skill('postgresql'), similarity: 0.78 },
  { jdSkill: skill('flask'), resumeSkill: skill('django'), similarity: 0.95 }
];

describe('rankGaps', () => {
  it('orders by importance, then by name, with neutral weight for unknown skills', () => {
    expect(rankGaps(missing, importance)).toEqual([
      { skill: skill('aws'), importance: 1.5 },
      { skill: skill('docker'), importance: 1.5 },
      { skill: skill('graphql'), importance: 1 },
      { skill: skill('communication'), importance: 0.8 }
    ]);
  });

  it('falls back to name order without weights', () => {
    expect(rankGaps(missing).map(gap => gap.skill.name)).toEqual(['aws', 'communication', 'docker', 'graphql']);
  });
});

describe('generateGaps', () => {
  it('lists develop suggestions first, then weak matches', () => {
    const report = generateGaps(missing, matched, {
      weakMatchThreshold: 0.85,
      suggestionCap: 10,
      importance
    });

    expect(report.gaps.map(gap => gap.skill.name)).toEqual(['aws', 'docker', 'graphql', 'communication']);
    expect(report.suggestions).toEqual([
      'develop aws',
      'develop docker',
      'develop graphql',
      'develop communication',
      'strengthen evidence for sql in resume',
      'strengthen evidence for kubernetes in resume'
    ]);
  });

  it('truncates to the cap keeping the highest-priority items', () => {
    const report = generateGaps(missing, matched, {
      weakMatchThreshold: 0.85,
      suggestionCap: 3,
      importance
    });

    expect(report.suggestions).toEqual(['develop aws', 'develop docker', 'develop graphql']);
    expect(report.gaps).toHaveLength(4);
  });

  it('produces no suggestions with a cap of zero', () => {
    const report = generateGaps(missing, matched, { weakMatchThreshold: 0.85, suggestionCap: 0 });

    expect(report.suggestions).toEqual([]);
  });

  it('skips weak-match suggestions when the weak threshold equals the match threshold', () => {
    const report = generateGaps([], matched, { weakMatchThreshold: 0.75, suggestionCap: 10 });

    expect(report.suggestions).toEqual([]);
  });
});
