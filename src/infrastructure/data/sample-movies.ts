import type { MovieCase } from '../../domain/entities/movie';

/**
 * Used when the case file is missing or yields no movies.
 */
export const SAMPLE_MOVIES: readonly MovieCase[] = Object.freeze([
	{
		title: 'The Matrix (sample)',
		genre: ['Sci-Fi', 'Action'],
		year: 1999,
		rating: 'R',
		duration: 136,
		criticScore: 8.7,
		hasSequel: 'yes',
	},
	{
		title: 'The Godfather (sample)',
		genre: ['Crime', 'Drama'],
		year: 1972,
		rating: 'R',
		duration: 175,
		criticScore: 9.2,
		hasSequel: 'yes',
	},
	{
		title: 'Toy Story (sample)',
		genre: ['Animation', 'Comedy'],
		year: 1995,
		rating: 'G',
		duration: 81,
		criticScore: 8.3,
		hasSequel: 'yes',
	},
]);
