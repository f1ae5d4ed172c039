import { KANYE_REST } from '../../config/apis.js';
import { Quote } from '../../core/quote.js';

/**
 * A kanye.rest quote. The API has no ids, so the text doubles as one.
 */
export class KanyeRestQuote extends Quote {
  constructor(text: string) {
    super({
      id: text,
      value: text,
      author: KANYE_REST.author,
      source: KANYE_REST.apiPage,
      date: null,
      tags: [],
    });
    Object.freeze(this);
  }
}
