import { type MusicApiPort, type TopTrack, type TopTracksPeriod } from '@botm/domain';
import { type SpotifyHttpClient } from './http';
import { CreatePlaylistResponseSchema, ReplaceTracksResponseSchema, TopTracksResponseSchema } from './schemas';

export class SpotifyApiClient implements MusicApiPort {
  constructor(private readonly http: SpotifyHttpClient) {}

  async fetchTopTracks(accessToken: string, period: TopTracksPeriod, limit: number): Promise<TopTrack[]> {
    const body = await this.http.request({
      method: 'GET',
      path: 'me/top/tracks',
      accessToken,
      query: { time_range: period, limit },
      schema: TopTracksResponseSchema,
    });
    return body.items.map((item) => ({ id: item.id, uri: item.uri, name: item.name }));
  }

  async createPlaylist(
    accessToken: string,
    spotifyId: string,
    details: { name: string; description: string },
  ): Promise<string> {
    const body = await this.http.request({
      method: 'POST',
      path: `users/${encodeURIComponent(spotifyId)}/playlists`,
      accessToken,
      body: { name: details.name, description: details.description },
      schema: CreatePlaylistResponseSchema,
    });
    return body.id;
  }

  /** PUT replaces the playlist contents, so repeating it leaves the same tracks. */
  async replaceTracks(accessToken: string, playlistId: string, uris: string[]): Promise<void> {
    await this.http.request({
      method: 'PUT',
      path: `playlists/${encodeURIComponent(playlistId)}/tracks`,
      accessToken,
      body: { uris },
      schema: ReplaceTracksResponseSchema,
    });
  }
}
