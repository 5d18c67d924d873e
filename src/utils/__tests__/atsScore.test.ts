import { computeAtsScore, countWords, detectSections, keywordDensity } from '../atsScore';

const shortResume = [
  'Jane Placeholder',
  'Skills:',
  'Python, SQL',
  'Work Experience',
  'Built reporting pipelines.',
  'Education',
  'BSc'
].join('\n');

describe('detectSections', () => {
  it('finds short heading lines naming standard sections', () => {
    expect(detectSections(shortResume)).toEqual(['skills', 'experience', 'education']);
  });

  it('accepts singular headings and ignores long sentences', () => {
    const text = ['Project', 'Certification:', 'I have experience with many skills and projects'].join('\n');

    expect(detectSections(text)).toEqual(['certifications', 'projects']);
  });
});

describe('keywordDensity', () => {
  it('is the share of JD skills present as whole words', () => {
    expect(keywordDensity(shortResume, ['python', 'sql', 'docker', 'rest apis'])).toBe(0.5);
  });

  it('is 0 without JD skills', () => {
    expect(keywordDensity(shortResume, [])).toBe(0);
  });
});

describe('computeAtsScore', () => {
  it('penalizes short resumes and missing sections', () => {
    expect(countWords(shortResume)).toBe(12);

    expect(computeAtsScore(shortResume, ['python', 'sql', 'docker', 'rest apis'])).toEqual({
      ats_score: 50,
      keyword_density: 0.5,
      sections: ['skills', 'experience', 'education'],
      word_count: 12
    });
  });

  it('scores 100 for a complete resume of optimal length', () => {
    const filler = Array.from({ length: 192 }, () => 'delivered').join(' ');
    const text = ['Skills', 'Python SQL', 'Experience', filler, 'Education', 'Projects', 'Certifications', 'Publications'].join('\n');

    const report = computeAtsScore(text, ['python', 'sql']);

    expect(report.word_count).toBe(200);
    expect(report.sections).toHaveLength(6);
    expect(report.ats_score).toBe(100);
  });
});
