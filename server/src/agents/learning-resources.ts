import { z } from 'zod';
import { lazyDataFile } from '../lib/data-files.js';
import type { Channel, LearningResource, RoadmapItem } from './types.js';

const LearningChannelsSchema = z.object({
  defaultRole: z.string(),
  channels: z.record(z.array(z.object({ name: z.string(), url: z.string().url() }))),
});

const learningChannels = lazyDataFile('learning-channels.json', LearningChannelsSchema);

export function youtubeSearchUrl(query: string): string {
  return `https://www.youtube.com/results?search_query=${encodeURIComponent(query)}`;
}

/** One search link per roadmap skill; items without a skill name are skipped. */
export function getLearningResources(roadmap: RoadmapItem[]): LearningResource[] {
  return roadmap
    .filter((item) => item.skill.trim().length > 0)
    .map((item) => ({
      skill: item.skill,
      priority: item.priority,
      search_url: youtubeSearchUrl(`${item.skill} tutorial`),
      videos: [{
        title: `Search: ${item.skill} tutorial`,
        url: youtubeSearchUrl(`${item.skill} tutorial for beginners`),
        channel: 'YouTube Search',
      }],
    }));
}

export function getCuratedChannels(targetRole: string): Channel[] {
  const data = learningChannels();
  const channels = data.channels[targetRole] ?? data.channels[data.defaultRole] ?? [];
  return channels.map((c) => ({ ...c }));
}
