import type { LabeledRecord } from '../models';

/** A handful of short labeled sentences; enough to exercise training, not to measure it. */
export function createSampleCorpus(): LabeledRecord[] {
  return [
    { language: 'english', text: 'The weather is lovely and the garden is full of flowers.' },
    { language: 'english', text: 'She reads a book in the garden every morning.' },
    { language: 'english', text: 'We walked to the station and waited for the train.' },
    { language: 'spanish', text: 'El tiempo es agradable y el jardín está lleno de flores.' },
    { language: 'spanish', text: 'Ella lee un libro en el jardín cada mañana.' },
    { language: 'spanish', text: 'Caminamos a la estación y esperamos el tren.' },
    { language: 'french', text: "Le temps est agréable et le jardin est plein de fleurs." },
    { language: 'french', text: 'Elle lit un livre dans le jardin chaque matin.' },
    { language: 'french', text: "Nous avons marché jusqu'à la gare et attendu le train." },
    { language: 'russian', text: 'Погода прекрасная, и сад полон цветов.' },
    { language: 'russian', text: 'Она читает книгу в саду каждое утро.' },
    { language: 'thai', text: 'อากาศดีมากและสวนเต็มไปด้วยดอกไม้' },
    { language: 'chinese', text: '天气很好，花园里开满了花。' },
  ];
}
